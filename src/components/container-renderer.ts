// src/components/container-renderer.ts
import type { MappingEntry, RenderContext, RenderFn } from '../types/renderable.ts';
import { TREE } from './constants.ts';
import { spaces } from './format.ts';
import { classify } from './renderable.ts';

/**
 * Key text inside `[...]`.
 * Strings are quoted in bracketed blocks and bare in trees; other keys go through the value renderer.
 */
export function renderKey(
  key: unknown,
  ctx: RenderContext,
  render: RenderFn,
  quoteStrings: boolean,
): string {
  if (typeof key === 'string') return quoteStrings ? `"${key}"` : key;
  if (typeof key === 'number' || typeof key === 'bigint' || typeof key === 'boolean') {
    return String(key);
  }
  return render(key, ctx);
}

/**
 * Bracketed block:
 *
 *   {
 *       ["name"] = "door",
 *       ["size"] = {
 *           [0] = 2
 *       }
 *   }
 *
 * `ctx.depth` is the level of this mapping; entries sit one tab deeper.
 */
export function renderBracketed(
  entries: readonly MappingEntry[],
  ctx: RenderContext,
  render: RenderFn,
): string {
  if (entries.length === 0) return '{}';

  const depth = ctx.depth + 1;
  const pad = spaces(ctx.tabWidth * depth);
  const child: RenderContext = { ...ctx, depth };

  const lines = entries.map(
    ([key, value]) => `${pad}[${renderKey(key, ctx, render, true)}] = ${render(value, child)}`,
  );
  return `{\n${lines.join(',\n')}\n${spaces(ctx.tabWidth * ctx.depth)}}`;
}

/**
 * ASCII tree. Each entry is one line ("├─ [key]: value"); nested mappings get a
 * header line and their children indented under "│  " (or blank after the last entry).
 * An empty mapping yields no lines.
 */
export function renderTree(
  entries: readonly MappingEntry[],
  ctx: RenderContext,
  render: RenderFn,
): string {
  const size = entries.length;
  const lines: string[] = [];
  let current = 0;

  for (const [key, value] of entries) {
    current += 1;
    const isLast = current === size;
    const head = `${ctx.indent}${isLast ? TREE.LAST : TREE.BRANCH}[${renderKey(key, ctx, render, false)}]:`;

    const tagged = classify(value);
    if (tagged.kind === 'mapping' && !ctx.seen.has(tagged.source)) {
      lines.push(head);
      const nested = renderTree(
        tagged.entries,
        {
          ...ctx,
          depth: ctx.depth + 1,
          indent: ctx.indent + (isLast ? TREE.SPACE : TREE.PIPE),
          seen: new Set([...ctx.seen, tagged.source]),
        },
        render,
      );
      if (nested) lines.push(nested);
      continue;
    }

    lines.push(`${head} ${render(value, { ...ctx, depth: ctx.depth + 1 })}`);
  }

  return lines.join('\n');
}
