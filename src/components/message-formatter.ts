// src/components/message-formatter.ts
import type { TraceMode, TraceSource } from '../types/trace.ts';
import { BODY_SEPARATOR, BULLET } from './constants.ts';
import { formatDecoration, plainDecoration, splitLines } from './format.ts';
import { parseTrace } from './trace-parser.ts';

export type FormatterOptions = {
  traceSource: TraceSource;
  traceMode: TraceMode;
  /** Marker for single-frame mode. */
  scriptRoot: string;
  /** Host lines to drop after the seed header. */
  traceSkip: number;
};

export type MessageFormatter = {
  format: (typeLabel: string, parts: readonly string[]) => string;
};

/** Drop the seed header (as many lines as the seed spans) plus `skip` host lines. */
export function stripSeed(raw: string, seed: string, skip = 0): string {
  const drop = splitLines(seed).length + Math.max(0, skip);
  return splitLines(raw).slice(drop).join('\n');
}

/**
 * Assemble the final block:
 *
 *   [ ───────── PRINT ───────── ]
 *
 *   • "hello"
 *   • 42
 *
 *
 *   → src/app.ts (line 7): function 'main'
 *
 *   [ ───────────────────────── ]
 *
 * Multi-part bodies get one extra blank line before the trace.
 */
export function composeMessage(typeLabel: string, parts: readonly string[], trace: string): string {
  const body = parts.join(BODY_SEPARATOR);
  const extra = parts.length >= 2 ? '\n' : '';
  return `\n\n${formatDecoration(typeLabel)}\n\n${BULLET}${body}\n${extra}\n${trace}\n\n${plainDecoration()}\n\n`;
}

export function createFormatter(opts: FormatterOptions): MessageFormatter {
  const { traceSource, traceMode, scriptRoot, traceSkip } = opts;

  return {
    format(typeLabel, parts) {
      const body = parts.join(BODY_SEPARATOR);
      const raw = traceSource.capture(body);
      const frames = stripSeed(raw, body, traceSkip);
      const trace = parseTrace(frames, { mode: traceMode, scriptRoot });
      return composeMessage(typeLabel, parts, trace);
    },
  };
}
