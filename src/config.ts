/**
 * Centralized configuration for mirror and verification runs
 * Supports customization via environment variables and .env files
 */
import * as fs from "node:fs";
import * as path from "node:path";

import { CHECKPOINT_FILE } from "./checkpoint-store.js";
import { debugConfig } from "./debug.js";
import { ConfigError } from "./errors.js";
import { HASH_LOG_FILE } from "./hash-log.js";
import { DEFAULT_HASH_ALGORITHM, isSupportedAlgorithm } from "./hash-indexer.js";
import { DEFAULT_MIRROR_COMMAND, MIRROR_LOG_FILE } from "./mirror.js";

export interface RunSettings {
  /** Hash log rotation threshold in bytes */
  maxLogSizeBytes: number;
  algorithm: string;
  retries: number;
  retryWaitSeconds: number;
  interPacketGapMs: number;
  mirrorCommand: string;
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: RunSettings = {
  maxLogSizeBytes: 50 * 1024 * 1024, // 50 MB
  algorithm: DEFAULT_HASH_ALGORITHM,
  retries: 5,
  retryWaitSeconds: 5,
  interPacketGapMs: 0,
  mirrorCommand: DEFAULT_MIRROR_COMMAND,
};

/**
 * Environment variable names for each setting
 */
export const SETTINGS_ENV_VARS = {
  maxLogSizeBytes: "MIRROR_VERIFY_MAX_LOG_SIZE",
  algorithm: "MIRROR_VERIFY_ALGORITHM",
  retries: "MIRROR_VERIFY_RETRIES",
  retryWaitSeconds: "MIRROR_VERIFY_RETRY_WAIT",
  interPacketGapMs: "MIRROR_VERIFY_IPG",
  mirrorCommand: "MIRROR_VERIFY_MIRROR_COMMAND",
} as const satisfies Record<keyof RunSettings, string>;

export type SettingKey = keyof typeof SETTINGS_ENV_VARS;

const SIZE_UNITS: Record<string, number> = {
  "": 1,
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

/**
 * Parse a byte size such as "52428800", "512KB" or "50MB" (1024 based)
 *
 * @returns Size in bytes, or null if the value is not a positive size
 */
export function parseSize(value: string): number | null {
  const match = value.trim().toUpperCase().match(/^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)?$/);
  if (!match) return null;

  const bytes = Math.floor(parseFloat(match[1]) * SIZE_UNITS[match[2] ?? ""]);
  return bytes > 0 ? bytes : null;
}

/**
 * Format a byte count for display (e.g., "512 B", "1.5 KB", "50 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KB", "MB", "GB"];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  const rounded = Math.round(value * 10) / 10;
  return `${Number.isInteger(rounded) ? rounded.toFixed(0) : rounded.toFixed(1)} ${units[unit]}`;
}

/**
 * Load .env files from the working directory and home directory
 */
function loadEnvFile(): void {
  // Try current directory first, then home directory
  const envPaths = [
    path.join(process.cwd(), ".env"),
    path.join(process.env.HOME || "", ".mirror-verify.env"),
  ];

  for (const envPath of envPaths) {
    let content: string;
    try {
      content = fs.readFileSync(envPath, "utf-8");
    } catch {
      continue;
    }

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;

      const match = trimmed.match(/^([^=]+)=(.*)$/);
      if (match) {
        const key = match[1].trim();
        let value = match[2].trim();
        if ((value.startsWith('"') && value.endsWith('"')) ||
            (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        }
        // Only set if not already set in environment
        if (!process.env[key]) {
          process.env[key] = value;
        }
      }
    }
    debugConfig("Loaded environment from %s", envPath);
  }
}

let envLoaded = false;

function ensureEnvLoaded(): void {
  if (!envLoaded) {
    loadEnvFile();
    envLoaded = true;
  }
}

/**
 * Read a non-negative integer setting from the environment
 */
function readIntegerEnv(key: SettingKey, fallback: number): number {
  const envValue = process.env[SETTINGS_ENV_VARS[key]];
  if (envValue) {
    const parsed = parseInt(envValue, 10);
    if (!isNaN(parsed) && parsed >= 0 && String(parsed) === envValue.trim()) {
      return parsed;
    }
    debugConfig.warn("Ignoring invalid %s=%s", SETTINGS_ENV_VARS[key], envValue);
  }
  return fallback;
}

/**
 * Validate a digest algorithm name and normalize it to lowercase
 *
 * @throws ConfigError for names the runtime cannot hash with
 */
export function normalizeAlgorithm(algorithm: string): string {
  const normalized = algorithm.trim().toLowerCase();
  if (!isSupportedAlgorithm(normalized)) {
    throw new ConfigError(`Unsupported hash algorithm: ${algorithm}`);
  }
  return normalized;
}

/**
 * Resolve run settings
 * Priority: explicit override > environment variable > default value
 *
 * @throws ConfigError for an unsupported algorithm
 */
export function loadSettings(overrides: Partial<RunSettings> = {}): RunSettings {
  ensureEnvLoaded();

  const envSize = process.env[SETTINGS_ENV_VARS.maxLogSizeBytes];
  let maxLogSizeBytes = DEFAULT_SETTINGS.maxLogSizeBytes;
  if (envSize) {
    const parsed = parseSize(envSize);
    if (parsed === null) {
      debugConfig.warn("Ignoring invalid %s=%s", SETTINGS_ENV_VARS.maxLogSizeBytes, envSize);
    } else {
      maxLogSizeBytes = parsed;
    }
  }

  const settings: RunSettings = {
    maxLogSizeBytes,
    algorithm: process.env[SETTINGS_ENV_VARS.algorithm] || DEFAULT_SETTINGS.algorithm,
    retries: readIntegerEnv("retries", DEFAULT_SETTINGS.retries),
    retryWaitSeconds: readIntegerEnv("retryWaitSeconds", DEFAULT_SETTINGS.retryWaitSeconds),
    interPacketGapMs: readIntegerEnv("interPacketGapMs", DEFAULT_SETTINGS.interPacketGapMs),
    mirrorCommand: process.env[SETTINGS_ENV_VARS.mirrorCommand] || DEFAULT_SETTINGS.mirrorCommand,
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(settings, { [key]: value });
    }
  }

  if (settings.maxLogSizeBytes <= 0) {
    throw new ConfigError(`Maximum log size must be positive, got ${settings.maxLogSizeBytes}`);
  }
  settings.algorithm = normalizeAlgorithm(settings.algorithm);

  debugConfig("Resolved settings %o", settings);
  return settings;
}

/**
 * File locations inside the log directory
 */
export interface RunPaths {
  logDir: string;
  checkpointPath: string;
  hashLogPath: string;
  mirrorLogPath: string;
}

export function resolvePaths(logDir: string): RunPaths {
  const dir = path.resolve(logDir);
  return {
    logDir: dir,
    checkpointPath: path.join(dir, CHECKPOINT_FILE),
    hashLogPath: path.join(dir, HASH_LOG_FILE),
    mirrorLogPath: path.join(dir, MIRROR_LOG_FILE),
  };
}
