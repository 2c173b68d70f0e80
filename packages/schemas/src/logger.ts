import type { Logger } from "./types.js";

export class ConsoleLogger implements Logger {
  private prefix: string;

  constructor(component: string) {
    // Control characters in the component name become underscores
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeName = component.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[tickvale:${safeName}]`;
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

const noop = (): void => {};

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
