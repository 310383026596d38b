/**
 * Namespaced diagnostics on stderr
 *
 * Silent unless DEBUG names the namespace, e.g.
 *   DEBUG=mirror-verify:* mirror-verify sync ...
 *   DEBUG=mirror-verify:indexer,mirror-verify:rotator mirror-verify verify ...
 *
 * Lines are prefixed with an ISO timestamp and the namespace.
 */

const TOOL_PREFIX = "mirror-verify";

export type DebugNamespace =
  | "indexer"
  | "checkpoint"
  | "rotator"
  | "verifier"
  | "mirror"
  | "config";

type Level = "debug" | "warn" | "error";

export interface DebugLogger {
  (message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  /** Logs the message, then the error's message and stack on their own lines */
  error(message: string, error?: unknown): void;
}

const LEVEL_TAGS: Record<Level, string> = {
  debug: "",
  warn: "WARN: ",
  error: "ERROR: ",
};

/**
 * DEBUG is re-read on every call
 */
function matchesDebugEnv(namespace: DebugNamespace): boolean {
  const patterns = (process.env.DEBUG ?? "")
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);

  return patterns.some(
    (pattern) =>
      pattern === "*" ||
      pattern === `${TOOL_PREFIX}:*` ||
      pattern === `${TOOL_PREFIX}:${namespace}`
  );
}

export function createDebug(namespace: DebugNamespace): DebugLogger {
  const tag = `[${TOOL_PREFIX}:${namespace}]`;

  const emit = (level: Level, message: string, args: unknown[]) => {
    console.error(`${new Date().toISOString()} ${tag} ${LEVEL_TAGS[level]}${message}`, ...args);
  };

  const logger = (message: string, ...args: unknown[]) => {
    if (matchesDebugEnv(namespace)) emit("debug", message, args);
  };

  logger.warn = (message: string, ...args: unknown[]) => {
    if (matchesDebugEnv(namespace)) emit("warn", message, args);
  };

  logger.error = (message: string, error?: unknown) => {
    if (!matchesDebugEnv(namespace)) return;
    emit("error", message, []);

    const details =
      error instanceof Error
        ? [error.message, error.stack]
        : error === undefined
          ? []
          : [String(error)];
    const stamp = new Date().toISOString();
    for (const detail of details) {
      if (detail) console.error(`${stamp} ${tag}   ${detail}`);
    }
  };

  return logger;
}

export const debugIndexer = createDebug("indexer");
export const debugCheckpoint = createDebug("checkpoint");
export const debugRotator = createDebug("rotator");
export const debugVerifier = createDebug("verifier");
export const debugMirror = createDebug("mirror");
export const debugConfig = createDebug("config");
