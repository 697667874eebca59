// src/types/trace.ts

/** `sweep` reformats every frame line; `single-frame` keeps only the first frame under the script root. */
export type TraceMode = 'sweep' | 'single-frame';

export type TraceFrame = {
  sourcePath: string;
  lineNumber: number;
  functionName?: string;
};

export interface TraceSource {
  /** Raw, host-formatted call stack with `seed` embedded at its head. */
  capture(seed: string): string;
}
