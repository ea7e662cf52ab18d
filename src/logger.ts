import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import chalk from "chalk";
import { timestamp } from "./utils";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Console-only progress line; never written to the log file. */
  progress(message: string): void;
}

export type LoggerOptions = {
  logFile?: string;
  console?: boolean;
};

export function createLogger({ logFile, console: toConsole = true }: LoggerOptions = {}): Logger {
  if (logFile) mkdirSync(dirname(logFile), { recursive: true });

  const write = (level: LogLevel, message: string) => {
    if (!logFile) return;
    appendFileSync(logFile, `${timestamp()} | ${level} | ${message}\n`, "utf-8");
  };

  return {
    info(message) {
      write("INFO", message);
      if (toConsole) console.info(chalk.blue(message));
    },
    success(message) {
      write("INFO", message);
      if (toConsole) console.info(chalk.green(message));
    },
    warn(message) {
      write("WARNING", message);
      if (toConsole) console.warn(chalk.yellow(message));
    },
    error(message) {
      write("ERROR", message);
      if (toConsole) console.error(chalk.red(message));
    },
    progress(message) {
      if (toConsole) console.info(chalk.gray(message));
    },
  };
}

export const silentLogger: Logger = createLogger({ console: false });
