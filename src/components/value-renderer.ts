// src/components/value-renderer.ts
import type {
  HasQualifiedName,
  RenderContext,
  RenderOptions,
} from '../types/renderable.ts';
import { CYCLE_MARKER } from './constants.ts';
import { renderBracketed, renderTree } from './container-renderer.ts';
import { classify, typeName } from './renderable.ts';

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  containerStyle: 'bracketed',
  tabWidth: 4,
  qualifiedNamePrefix: '',
};

function qualifiedName(target: HasQualifiedName, prefix: string): string {
  try {
    return `${prefix}${target.getFullName()}`;
  } catch {
    // a host object that cannot name itself is just another object
    return typeName(target);
  }
}

function renderInContext(value: unknown, ctx: RenderContext): string {
  const tagged = classify(value);
  switch (tagged.kind) {
    case 'string':
      return `"${tagged.value}"`;
    case 'number':
    case 'boolean':
      return String(tagged.value);
    case 'qualified':
      return qualifiedName(tagged.target, ctx.qualifiedNamePrefix);
    case 'other':
      return tagged.typeName;
    case 'mapping': {
      if (ctx.seen.has(tagged.source)) return CYCLE_MARKER;
      const inner: RenderContext = { ...ctx, seen: new Set([...ctx.seen, tagged.source]) };
      return ctx.containerStyle === 'tree'
        ? renderTree(tagged.entries, inner, renderInContext)
        : renderBracketed(tagged.entries, inner, renderInContext);
    }
  }
}

/**
 * Render any value as text for a message body.
 *
 * Strings are quoted verbatim, numbers and booleans use their canonical form,
 * arrays/Maps/plain objects become a bracketed block or a tree, objects with
 * `getFullName()` render that name, and everything else renders its type name.
 */
export function renderValue(value: unknown, options: Partial<RenderOptions> = {}): string {
  return renderInContext(value, {
    ...DEFAULT_RENDER_OPTIONS,
    ...options,
    depth: 0,
    indent: '',
    seen: new Set(),
  });
}
