// test/unit/format.test.ts
import { describe, it, expect } from 'vitest';

import {
  formatDecoration,
  plainDecoration,
  spaces,
  splitLines,
} from '../../src/components/format.ts';

const DASH = '─';

describe('formatDecoration', () => {
  it('centres the standard labels', () => {
    expect(formatDecoration('PRINT')).toBe(`[ ${DASH.repeat(9)} PRINT ${DASH.repeat(9)} ]`);
    expect(formatDecoration('WARNING')).toBe(`[ ${DASH.repeat(8)} WARNING ${DASH.repeat(8)} ]`);
    expect(formatDecoration('CHECKPOINT')).toBe(
      `[ ${DASH.repeat(6)} CHECKPOINT ${DASH.repeat(7)} ]`,
    );
  });

  it('keeps a 29-character line with a floor/ceil dash split for every label that fits', () => {
    for (let n = 0; n <= 23; n++) {
      const label = 'A'.repeat(n);
      const line = formatDecoration(label);
      expect(line).toHaveLength(29);

      const m = /^\[ (─*) (A*) (─*) \]$/.exec(line);
      expect(m).not.toBeNull();
      const left = m?.[1].length ?? -1;
      const right = m?.[3].length ?? -1;
      expect(m?.[2]).toBe(label);
      expect(left + right + n + 2).toBe(25);
      expect(right - left).toBeGreaterThanOrEqual(0);
      expect(right - left).toBeLessThanOrEqual(1);
    }
  });

  it('clamps the dashes at zero for over-long labels', () => {
    const label = 'X'.repeat(30);
    expect(formatDecoration(label)).toBe(`[  ${label}  ]`);
  });
});

describe('plainDecoration', () => {
  it('is the 25-dash banner with no label', () => {
    expect(plainDecoration()).toBe(`[ ${DASH.repeat(25)} ]`);
    expect(plainDecoration()).toHaveLength(29);
  });
});

describe('spaces', () => {
  it('pads with n spaces and clamps negatives', () => {
    expect(spaces(3)).toBe('   ');
    expect(spaces(0)).toBe('');
    expect(spaces(-2)).toBe('');
  });
});

describe('splitLines', () => {
  it('normalizes CRLF', () => {
    expect(splitLines('a\r\nb\nc')).toEqual(['a', 'b', 'c']);
  });
});
