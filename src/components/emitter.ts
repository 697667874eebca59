// src/components/emitter.ts
import type { Emitter } from '../types/emitter.ts';
import type { RenderOptions } from '../types/renderable.ts';
import type { Sinks } from '../types/sinks.ts';
import type { TraceSource } from '../types/trace.ts';
import { LABEL } from '../types/ui.ts';
import { defaultConfig, loadConfig, mergeConfig, type TraceboxConfig } from './config.ts';
import { ConsoleSinks } from './console-sinks.ts';
import { DEFAULT_ASSERT_MESSAGE } from './constants.ts';
import { TaskHalt } from './halt.ts';
import { createFormatter } from './message-formatter.ts';
import { createNodeTraceSource } from './trace-source.ts';
import { renderValue } from './value-renderer.ts';

export type EmitterOptions = {
  sinks?: Sinks;
  traceSource?: TraceSource;
  /** Merged over built-in defaults; when given, config file and env are not read. */
  config?: Partial<TraceboxConfig>;
};

/**
 * Create the five entry points over a set of sinks.
 * Follows the same pattern as the formatter: closures over resolved collaborators.
 */
export function createEmitter(opts: EmitterOptions = {}): Emitter {
  const config: TraceboxConfig = opts.config
    ? mergeConfig(defaultConfig(), opts.config)
    : loadConfig();
  const sinks = opts.sinks ?? new ConsoleSinks();
  const traceSource =
    opts.traceSource ?? createNodeTraceSource({ ignore: config.traceIgnore });

  const formatter = createFormatter({
    traceSource,
    traceMode: config.traceMode,
    scriptRoot: config.scriptRoot,
    traceSkip: config.traceSkip,
  });

  const renderOptions: RenderOptions = {
    containerStyle: config.containerStyle,
    tabWidth: config.tabWidth,
    qualifiedNamePrefix: config.qualifiedNamePrefix,
  };
  const renderAll = (values: unknown[]) => values.map((v) => renderValue(v, renderOptions));

  const emitter: Emitter = {
    print(...values) {
      sinks.info(formatter.format(LABEL.print, renderAll(values)));
    },

    warn(...values) {
      sinks.warning(false, formatter.format(LABEL.warn, renderAll(values)));
    },

    error(...values: unknown[]): never {
      sinks.error(formatter.format(LABEL.error, renderAll(values)));
      throw new TaskHalt('error');
    },

    assert(condition, message) {
      if (condition) return;
      const text =
        message === undefined
          ? DEFAULT_ASSERT_MESSAGE
          : typeof message === 'string'
            ? message
            : renderValue(message, renderOptions);
      sinks.error(formatter.format(LABEL.assert, [text]));
      throw new TaskHalt('assert');
    },

    checkpoint(name) {
      sinks.diagnostic(formatter.format(LABEL.checkpoint, [renderValue(name, renderOptions)]));
    },
  };

  return emitter;
}
