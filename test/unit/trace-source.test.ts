// test/unit/trace-source.test.ts
import { describe, it, expect } from 'vitest';

import { DEFAULT_TRACE_IGNORE } from '../../src/components/constants.ts';
import {
  LIBRARY_ROOT,
  createNodeTraceSource,
  filterFrames,
} from '../../src/components/trace-source.ts';

const RAW = [
  'Error: seed',
  '    at run (/app/src/run.ts:1:1)',
  '    at Module._compile (node:internal/modules/cjs/loader:1:1)',
  '    at x (/app/node_modules/vitest/dist/a.js:2:2)',
  '    at emit (/lib/root/emitter.ts:3:3)',
  '    at new Promise (<anonymous>)',
  '    at file:///app/src/b.ts:4:4',
].join('\n');

describe('filterFrames', () => {
  it('drops ignored and library frames and keeps everything else', () => {
    expect(filterFrames(RAW, { ignore: DEFAULT_TRACE_IGNORE, libraryRoot: '/lib/root' })).toBe(
      [
        'Error: seed',
        '    at run (/app/src/run.ts:1:1)',
        '    at new Promise (<anonymous>)',
        '    at file:///app/src/b.ts:4:4',
      ].join('\n'),
    );
  });

  it('keeps every line with no ignore list and no library root', () => {
    expect(filterFrames(RAW, { ignore: [], libraryRoot: null })).toBe(RAW);
  });

  it('matches Windows file URLs against a drive-letter library root', () => {
    const raw = '    at e (file:///C:/lib/root/emitter.ts:1:1)\n    at r (file:///C:/app/run.ts:2:2)';
    expect(filterFrames(raw, { ignore: [], libraryRoot: 'C:/lib/root' })).toBe(
      '    at r (file:///C:/app/run.ts:2:2)',
    );
  });

  it('matches library roots with or without a trailing slash', () => {
    const raw = '    at a (/lib/root/x.ts:1:1)\n    at b (/lib/rooted/y.ts:1:1)';
    expect(filterFrames(raw, { ignore: [], libraryRoot: '/lib/root/' })).toBe(
      '    at b (/lib/rooted/y.ts:1:1)',
    );
  });
});

describe('createNodeTraceSource', () => {
  it('puts the seed on the first line and keeps the caller frame', () => {
    const out = createNodeTraceSource().capture('seed');
    const lines = out.split('\n');

    expect(lines[0]).toBe('Error: seed');
    expect(out).toContain('trace-source.test.ts');
    expect(out).not.toContain(`${LIBRARY_ROOT}/components/trace-source.ts`);
  });

  it('keeps library frames when the root is disabled', () => {
    const out = createNodeTraceSource({ libraryRoot: null, ignore: [] }).capture('seed');
    expect(out).toMatch(/components\/trace-source\.ts:\d+/);
  });

  it('restores the stack trace limit', () => {
    const before = Error.stackTraceLimit;
    createNodeTraceSource().capture('seed');
    expect(Error.stackTraceLimit).toBe(before);
  });
});
