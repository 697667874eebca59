// src/types/emitter.ts

export interface Emitter {
  /** Render values and send a PRINT block to the console sink. */
  print(...values: unknown[]): void;

  /** Send a WARNING block to the warning sink (flag fixed to false). */
  warn(...values: unknown[]): void;

  /** Send an ERROR block to the error sink, then halt the calling task. */
  error(...values: unknown[]): never;

  /** No-op when `condition` is truthy; otherwise report an ASSERTION block and halt. */
  assert(condition: unknown, message?: unknown): void;

  /** Send a CHECKPOINT block to the diagnostic sink. */
  checkpoint(name: unknown): void;
}
