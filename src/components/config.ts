// src/components/config.ts
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { SchemaObject, ValidateFunction } from 'ajv';
import Ajv2020 from 'ajv/dist/2020.js';
import * as fs from 'fs-extra';

import type { ContainerStyle } from '../types/renderable.ts';
import type { TraceMode } from '../types/trace.ts';
import {
  CONFIG_FILE,
  DEFAULT_TRACE_IGNORE,
  ENV_CONFIG,
  ENV_CONTAINER_STYLE,
  ENV_NAME_PREFIX,
  ENV_SCRIPT_ROOT,
  ENV_TAB_WIDTH,
  ENV_TRACE_IGNORE,
  ENV_TRACE_MODE,
  ENV_TRACE_SKIP,
} from './constants.ts';
import { toPosix } from './format.ts';

export type TraceboxConfig = {
  containerStyle: ContainerStyle;
  traceMode: TraceMode;
  tabWidth: number;
  scriptRoot: string;
  qualifiedNamePrefix: string;
  traceSkip: number;
  traceIgnore: string[];
};

export type LoadConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<TraceboxConfig>;
};

const SCHEMA_PATH = fileURLToPath(
  new URL('../../schema/tracebox.config.schema.json', import.meta.url),
);

const ajv = new Ajv2020({ allErrors: true });
let validator: ValidateFunction<Partial<TraceboxConfig>> | null = null;

function getValidator(): ValidateFunction<Partial<TraceboxConfig>> {
  if (!validator) {
    const schema: SchemaObject = fs.readJsonSync(SCHEMA_PATH);
    validator = ajv.compile<Partial<TraceboxConfig>>(schema);
  }
  return validator;
}

export function defaultConfig(cwd: string = process.cwd()): TraceboxConfig {
  return {
    containerStyle: 'bracketed',
    traceMode: 'sweep',
    tabWidth: 4,
    scriptRoot: toPosix(cwd),
    qualifiedNamePrefix: '',
    traceSkip: 0,
    traceIgnore: [...DEFAULT_TRACE_IGNORE],
  };
}

/** Lay `layer` over `base`; keys that are absent or explicitly `undefined` keep the base value. */
export function mergeConfig(base: TraceboxConfig, layer: Partial<TraceboxConfig> = {}): TraceboxConfig {
  return {
    containerStyle: layer.containerStyle ?? base.containerStyle,
    traceMode: layer.traceMode ?? base.traceMode,
    tabWidth: layer.tabWidth ?? base.tabWidth,
    scriptRoot: layer.scriptRoot ?? base.scriptRoot,
    qualifiedNamePrefix: layer.qualifiedNamePrefix ?? base.qualifiedNamePrefix,
    traceSkip: layer.traceSkip ?? base.traceSkip,
    traceIgnore: layer.traceIgnore ?? base.traceIgnore,
  };
}

function nonEmpty(v: string | undefined): string | undefined {
  const t = v?.trim();
  return t ? t : undefined;
}

function readFileLayer(file: string): unknown {
  if (!fs.pathExistsSync(file)) return {};
  try {
    return fs.readJsonSync(file);
  } catch (e) {
    console.warn(`⚠️  Could not read ${file}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
}

// Integers stay strings when malformed so the schema rejects them.
function readEnvLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const read = (name: string) => nonEmpty(env[name]);
  const int = (v: string) => (/^-?\d+$/.test(v) ? Number(v) : v);

  const style = read(ENV_CONTAINER_STYLE);
  if (style) out.containerStyle = style;
  const mode = read(ENV_TRACE_MODE);
  if (mode) out.traceMode = mode;
  const tab = read(ENV_TAB_WIDTH);
  if (tab) out.tabWidth = int(tab);
  const root = read(ENV_SCRIPT_ROOT);
  if (root) out.scriptRoot = root;
  const prefix = read(ENV_NAME_PREFIX);
  if (prefix) out.qualifiedNamePrefix = prefix;
  const skip = read(ENV_TRACE_SKIP);
  if (skip) out.traceSkip = int(skip);
  const ignore = read(ENV_TRACE_IGNORE);
  if (ignore) {
    out.traceIgnore = ignore
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return out;
}

function acceptLayer(candidate: unknown, origin: string): Partial<TraceboxConfig> {
  const validate = getValidator();
  if (validate(candidate)) return candidate;
  console.warn(`⚠️  Ignoring ${origin}: ${ajv.errorsText(validate.errors)}`);
  return {};
}

/**
 * Resolve configuration: defaults ← tracebox.config.json ← TRACEBOX_* env ← overrides.
 * An invalid file or environment layer is skipped with a warning; this never throws.
 */
export function loadConfig(opts: LoadConfigOptions = {}): TraceboxConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const file = path.resolve(cwd, nonEmpty(env[ENV_CONFIG]) ?? CONFIG_FILE);

  const layered = [
    acceptLayer(readFileLayer(file), file),
    acceptLayer(readEnvLayer(env), 'environment'),
    opts.overrides,
  ];
  return layered.reduce<TraceboxConfig>(
    (config, layer) => mergeConfig(config, layer),
    defaultConfig(cwd),
  );
}
