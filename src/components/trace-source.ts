// src/components/trace-source.ts
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import picomatch from 'picomatch';

import type { TraceSource } from '../types/trace.ts';
import { DEFAULT_TRACE_IGNORE, STACK_TRACE_LIMIT } from './constants.ts';
import { splitLines, toPosix } from './format.ts';
import { framePath, parseFrame } from './trace-parser.ts';

/** Root of this library's sources; frames under it are plumbing, never the call site. */
export const LIBRARY_ROOT = toPosix(path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..'));

const V8_LINE = /^\s*at\s/;

export type FrameFilterOptions = {
  /** picomatch globs, matched against POSIX paths without a leading "/" */
  ignore: string[];
  /** Frames under this directory are dropped; null keeps them */
  libraryRoot: string | null;
};

export type NodeTraceSourceOptions = Partial<FrameFilterOptions>;

/** Remove host-internal and library frames from a V8 stack; other lines are kept as-is. */
export function filterFrames(raw: string, opts: FrameFilterOptions): string {
  const isIgnored = opts.ignore.length
    ? picomatch(opts.ignore, { dot: true })
    : () => false;
  const root = opts.libraryRoot ? `${opts.libraryRoot.replace(/\/+$/, '')}/` : null;

  return splitLines(raw)
    .filter((line) => {
      if (!V8_LINE.test(line)) return true;
      const frame = parseFrame(line);
      if (!frame) return true;
      const p = framePath(frame.sourcePath);
      if (root && p.startsWith(root)) return false;
      return !isIgnored(p.replace(/^\/+/, ''));
    })
    .join('\n');
}

/** Capture the current V8 stack as "Error: <seed>" followed by the caller's frames. */
export function createNodeTraceSource(opts: NodeTraceSourceOptions = {}): TraceSource {
  const filter: FrameFilterOptions = {
    ignore: opts.ignore ?? DEFAULT_TRACE_IGNORE,
    libraryRoot: opts.libraryRoot === undefined ? LIBRARY_ROOT : opts.libraryRoot,
  };

  return {
    capture(seed) {
      const limit = Error.stackTraceLimit;
      Error.stackTraceLimit = STACK_TRACE_LIMIT;
      try {
        const probe = new Error(seed);
        return filterFrames(probe.stack ?? `Error: ${seed}`, filter);
      } finally {
        Error.stackTraceLimit = limit;
      }
    },
  };
}
