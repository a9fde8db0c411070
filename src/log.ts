import { appendFileSync } from "fs";

export type Logger = (message: string) => void;

/**
 * Timestamped log lines go to `logFile` only; the terminal belongs to the prompts.
 */
export function createLogger(logFile?: string): Logger {
  if (!logFile) {
    return () => {};
  }

  return (message: string) => {
    const timestamp = new Date().toISOString();
    try {
      appendFileSync(logFile, `[${timestamp}] ${message}\n`);
    } catch {
      // Ignore log file errors
    }
  };
}
