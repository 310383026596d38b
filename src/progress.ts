/**
 * Progress indicator for the mirror and hashing phases
 * Animates on a TTY, prints plain lines otherwise
 */

import chalk, { type ChalkInstance } from "chalk";

export function isTTY(): boolean {
  return process.stdout.isTTY === true;
}

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

/**
 * Format elapsed milliseconds as "12s" or "3m 4s"
 */
export function formatElapsed(ms: number): string {
  const elapsed = Math.floor(ms / 1000);
  if (elapsed < 60) {
    return `${elapsed}s`;
  }
  return `${Math.floor(elapsed / 60)}m ${elapsed % 60}s`;
}

export class Spinner {
  private message: string;
  private startTime = Date.now();
  private intervalId: NodeJS.Timeout | null = null;
  private frameIndex = 0;
  private stopped = false;

  constructor(message: string) {
    this.message = message;
  }

  start(): void {
    if (this.stopped) return;
    this.startTime = Date.now();

    if (isTTY()) {
      this.intervalId = setInterval(() => this.render(), 80);
      this.render();
    } else {
      console.log(`${this.message}...`);
    }
  }

  /**
   * Replace the message; on a TTY the next frame picks it up, so per-file
   * updates stay cheap
   */
  update(message: string): void {
    this.message = message;
  }

  private render(): void {
    if (this.stopped) return;
    const frame = SPINNER_FRAMES[this.frameIndex];
    const elapsed = formatElapsed(Date.now() - this.startTime);
    process.stdout.write(`\r${chalk.cyan(frame)} ${this.message} ${chalk.gray(`(${elapsed})`)}`);
    this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length;
  }

  succeed(message?: string): void {
    this.finish("✓", chalk.green, message);
  }

  fail(message?: string): void {
    this.finish("✗", chalk.red, message);
  }

  warn(message?: string): void {
    this.finish("⚠", chalk.yellow, message);
  }

  stop(): void {
    this.stopped = true;
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    if (isTTY()) {
      process.stdout.write("\r" + " ".repeat(80) + "\r");
    }
  }

  private finish(symbol: string, color: ChalkInstance, message?: string): void {
    this.stop();
    const elapsed = formatElapsed(Date.now() - this.startTime);
    const finalMessage = message || this.message;

    if (isTTY()) {
      process.stdout.write(`${color(symbol)} ${finalMessage} ${chalk.gray(`(${elapsed})`)}\n`);
    } else {
      console.log(`${symbol} ${finalMessage} (${elapsed})`);
    }
  }
}

export function createSpinner(message: string): Spinner {
  return new Spinner(message);
}
