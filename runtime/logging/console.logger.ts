import type { ReconcileLogger } from "../../src/core/logger";

export interface ConsoleLoggerOptions {
  readonly verbose: boolean;
  readonly out?: (message: string) => void;
  readonly err?: (message: string) => void;
}

export class ConsoleReconcileLogger implements ReconcileLogger {
  private readonly verbose: boolean;
  private readonly out: (message: string) => void;
  private readonly err: (message: string) => void;

  constructor(options: ConsoleLoggerOptions) {
    this.verbose = options.verbose;
    this.out = options.out ?? ((message) => console.log(message));
    this.err = options.err ?? ((message) => console.warn(message));
  }

  debug(message: string): void {
    if (this.verbose) {
      this.out(message);
    }
  }

  info(message: string): void {
    this.out(message);
  }

  warn(message: string): void {
    this.err(`warning: ${message}`);
  }
}
