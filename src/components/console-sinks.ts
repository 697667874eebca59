// src/components/console-sinks.ts
import type { Sinks } from '../types/sinks.ts';

export type ConsoleTarget = Pick<Console, 'log' | 'warn' | 'error' | 'info'>;

/**
 * Node host sinks over a console-like target.
 * Warnings follow the host convention: only reported when the flag is false.
 */
export class ConsoleSinks implements Sinks {
  private readonly out: ConsoleTarget;

  constructor(out: ConsoleTarget = console) {
    this.out = out;
  }

  info(text: string): void {
    this.out.log(text);
  }

  warning(flag: boolean, text: string): void {
    if (flag) return;
    this.out.warn(text);
  }

  error(text: string): void {
    this.out.error(text);
  }

  diagnostic(text: string): void {
    this.out.info(text);
  }
}
