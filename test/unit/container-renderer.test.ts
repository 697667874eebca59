// test/unit/container-renderer.test.ts
import { describe, it, expect } from 'vitest';

import { renderKey } from '../../src/components/container-renderer.ts';
import { renderValue, DEFAULT_RENDER_OPTIONS } from '../../src/components/value-renderer.ts';
import type { RenderContext } from '../../src/types/renderable.ts';

const tree = (value: unknown): string => renderValue(value, { containerStyle: 'tree' });

describe('renderKey', () => {
  const ctx: RenderContext = { ...DEFAULT_RENDER_OPTIONS, depth: 0, indent: '', seen: new Set() };
  const render = (): string => 'RENDERED';

  it('quotes string keys only when asked', () => {
    expect(renderKey('name', ctx, render, true)).toBe('"name"');
    expect(renderKey('name', ctx, render, false)).toBe('name');
  });

  it('stringifies scalar keys and delegates the rest', () => {
    expect(renderKey(3, ctx, render, true)).toBe('3');
    expect(renderKey(false, ctx, render, true)).toBe('false');
    expect(renderKey({}, ctx, render, true)).toBe('RENDERED');
  });
});

describe('tree rendering', () => {
  it('renders an empty mapping as nothing', () => {
    expect(tree({})).toBe('');
  });

  it('marks a lone entry as the last branch', () => {
    expect(tree({ a: 1 })).toBe('└─ [a]: 1');
  });

  it('nests mappings under header lines', () => {
    const out = tree({ a: 1, b: { c: 'x', d: { e: true } }, f: 2 });
    expect(out).toBe(
      [
        '├─ [a]: 1',
        '├─ [b]:',
        '│  ├─ [c]: "x"',
        '│  └─ [d]:',
        '│     └─ [e]: true',
        '└─ [f]: 2',
      ].join('\n'),
    );
  });

  it('indents children of the last entry with blanks', () => {
    expect(tree({ a: { b: 1 } })).toBe('└─ [a]:\n   └─ [b]: 1');
  });

  it('keeps the header of an empty nested mapping', () => {
    expect(tree({ a: {}, b: 1 })).toBe('├─ [a]:\n└─ [b]: 1');
  });

  it('uses indices for arrays', () => {
    expect(tree(['x', 'y'])).toBe('├─ [0]: "x"\n└─ [1]: "y"');
  });

  it('lists only the indices a sparse array holds', () => {
    expect(tree([, 1])).toBe('└─ [1]: 1');
    expect(tree(new Array(2))).toBe('');
    expect(tree({ a: new Array(3) })).toBe('└─ [a]:');
  });

  it('marks cycles inline', () => {
    const node: Record<string, unknown> = { id: 1 };
    node.self = node;
    expect(tree(node)).toBe('├─ [id]: 1\n└─ [self]: <cycle>');
  });
});
