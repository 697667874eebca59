// src/components/trace-parser.ts
import type { TraceFrame, TraceMode } from '../types/trace.ts';
import { FRAME_ARROW } from './constants.ts';
import { splitLines, toPosix } from './format.ts';

// "    at name (path:line:col)" / "    at path:line:col"
const V8_FRAME = /^\s*at\s+(?:(.+?)\s+\()?(.+?):(\d+)(?::\d+)?\)?\s*$/;
// "path:line<trailing text>"
const GENERIC_FRAME = /^\s*(.+?):(\d+)(.*)$/;
// "function name" / "function 'name'"
const FUNCTION_NAME = /\bfunction\s+'?([A-Za-z_$][\w$.]*)'?/;
const IDENTIFIER = /^[A-Za-z_$][\w$.]*$/;

function v8FunctionName(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const name = raw
    .replace(/^(?:async|new)\s+/, '')
    .replace(/\s+\[as [^\]]+\]$/, '');
  return IDENTIFIER.test(name) ? name : undefined;
}

/** Recognize one stack line as a frame, or null when it has no `path:line` shape. */
export function parseFrame(line: string): TraceFrame | null {
  const v8 = V8_FRAME.exec(line);
  if (v8) {
    const functionName = v8FunctionName(v8[1]);
    return {
      sourcePath: v8[2],
      lineNumber: parseInt(v8[3], 10),
      ...(functionName ? { functionName } : {}),
    };
  }

  const generic = GENERIC_FRAME.exec(line);
  if (!generic) return null;

  const fn = FUNCTION_NAME.exec(generic[3]);
  return {
    sourcePath: generic[1],
    lineNumber: parseInt(generic[2], 10),
    ...(fn ? { functionName: fn[1] } : {}),
  };
}

/** "→ src/door.ts (line 42): function 'open'" */
export function formatFrame(frame: TraceFrame): string {
  const fn = frame.functionName ? `: function '${frame.functionName}'` : '';
  return `${FRAME_ARROW} ${frame.sourcePath} (line ${frame.lineNumber})${fn}`;
}

/**
 * Reformat every frame line; any other line (headers, host noise) passes through.
 * Returns `text` untouched when it holds no frame at all.
 */
export function sweepTrace(text: string): string {
  const out: string[] = [];
  let matched = 0;
  for (const line of splitLines(text)) {
    const frame = parseFrame(line);
    if (frame) matched++;
    out.push(frame ? formatFrame(frame) : line);
  }
  if (matched === 0) return text;

  const joined = out.join('\n');
  return joined.startsWith('\n') ? joined.slice(1) : joined;
}

/**
 * Frame path as a plain POSIX path: no `file://` scheme, forward slashes, and no
 * slash before a drive letter ("file:///C:/app/x.ts" → "C:/app/x.ts").
 */
export function framePath(sourcePath: string): string {
  return toPosix(sourcePath.replace(/^file:\/\//, '')).replace(/^\/([A-Za-z]:\/)/, '$1');
}

/**
 * Keep only the first frame that belongs to the application: its line starts
 * with `scriptRoot`, or its source path (see `framePath`) does. Returns `text` untouched when none does.
 */
export function singleFrameTrace(text: string, scriptRoot: string): string {
  for (const line of splitLines(text)) {
    const frame = parseFrame(line);
    if (!frame) continue;
    if (
      line.trimStart().startsWith(scriptRoot) ||
      framePath(frame.sourcePath).startsWith(scriptRoot)
    ) {
      return formatFrame(frame);
    }
  }
  return text;
}

export function parseTrace(text: string, opts: { mode: TraceMode; scriptRoot: string }): string {
  return opts.mode === 'single-frame' ? singleFrameTrace(text, opts.scriptRoot) : sweepTrace(text);
}
