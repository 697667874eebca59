// src/index.ts
import { createEmitter, type EmitterOptions } from './components/emitter.ts';
import type { Emitter } from './types/emitter.ts';

export { createEmitter, type EmitterOptions } from './components/emitter.ts';
export { ConsoleSinks, type ConsoleTarget } from './components/console-sinks.ts';
export {
  defaultConfig,
  loadConfig,
  mergeConfig,
  type LoadConfigOptions,
  type TraceboxConfig,
} from './components/config.ts';
export { formatDecoration, plainDecoration } from './components/format.ts';
export {
  composeMessage,
  createFormatter,
  type FormatterOptions,
  type MessageFormatter,
} from './components/message-formatter.ts';
export { TaskHalt, isTaskHalt, runTask, runTaskAsync, type TaskOutcome } from './components/halt.ts';
export { renderValue } from './components/value-renderer.ts';
export { renderBracketed, renderTree } from './components/container-renderer.ts';
export { hasQualifiedName } from './components/renderable.ts';
export { formatFrame, framePath, parseFrame, parseTrace } from './components/trace-parser.ts';
export {
  createNodeTraceSource,
  filterFrames,
  type NodeTraceSourceOptions,
} from './components/trace-source.ts';
export type { Emitter } from './types/emitter.ts';
export type { EventKind } from './types/event.ts';
export type {
  ContainerStyle,
  HasQualifiedName,
  RenderableValue,
  RenderOptions,
} from './types/renderable.ts';
export type { Sinks } from './types/sinks.ts';
export type { TraceFrame, TraceMode, TraceSource } from './types/trace.ts';

let active: Emitter | null = null;

function current(): Emitter {
  if (!active) active = createEmitter();
  return active;
}

/** Replace the emitter behind the top-level functions. */
export function configure(opts: EmitterOptions = {}): Emitter {
  active = createEmitter(opts);
  return active;
}

export function print(...values: unknown[]): void {
  current().print(...values);
}

export function warn(...values: unknown[]): void {
  current().warn(...values);
}

export function error(...values: unknown[]): never {
  return current().error(...values);
}

export function assert(condition: unknown, message?: unknown): void {
  current().assert(condition, message);
}

export function checkpoint(name: unknown): void {
  current().checkpoint(name);
}
