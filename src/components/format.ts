// src/components/format.ts
// Shared, pure formatting helpers reused by the formatter and renderers

import { DECORATION, DECORATION_WIDTH } from './constants.ts';

/**
 * Centre `label` in the decoration banner, e.g. "[ ───────── PRINT ───────── ]".
 * Dash counts clamp at zero, so labels longer than the budget widen the line instead of failing.
 */
export function formatDecoration(label: string): string {
  const dashes = DECORATION_WIDTH - label.length - 2;
  const left = Math.max(0, Math.floor(dashes / 2));
  const right = Math.max(0, Math.ceil(dashes / 2));
  return `${DECORATION.OPEN} ${DECORATION.DASH.repeat(left)} ${label} ${DECORATION.DASH.repeat(right)} ${DECORATION.CLOSE}`;
}

/** Banner with no label; closes a message block. */
export function plainDecoration(): string {
  return `${DECORATION.OPEN} ${DECORATION.DASH.repeat(DECORATION_WIDTH)} ${DECORATION.CLOSE}`;
}

/** `n` spaces (none for negative `n`). */
export function spaces(n: number): string {
  return ' '.repeat(Math.max(0, n));
}

/** Normalize to POSIX separators */
export function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

/** Split host text into logical lines (CRLF tolerant). */
export function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, '\n').split('\n');
}
