import type { Notifier } from "./Notifier.ts";
import { getEnv } from "../utils/env.ts";

const PREFIX = "[doctree-sync]";

export class ConsoleNotifier implements Notifier {
  private readonly verbose: boolean;

  constructor(verbose: boolean = getEnv("DOCTREE_SYNC_DEBUG") !== undefined) {
    this.verbose = verbose;
  }

  debug(message: string): void {
    if (this.verbose) console.debug(`${PREFIX} ${message}`);
  }

  info(message: string): void {
    console.info(`${PREFIX} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} Warning: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} Error: ${message}`);
  }
}
