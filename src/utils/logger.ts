// src/utils/logger.ts

import chalk from "chalk";

export interface Logger {
  status(message: string): void;
  error(message: string): void;
}

export class NoopLogger implements Logger {
  status(): void {
    return;
  }

  error(): void {
    return;
  }
}

// Both streams go to stderr so stdout carries only the report.
export class ConsoleLogger implements Logger {
  status(message: string): void {
    console.error(chalk.gray(message));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }
}
