import { describe, it, expect } from 'vitest';
import { assembleOutput } from './output.js';

describe('assembleOutput', () => {
  it('puts the header before the retained rows, in order', () => {
    expect(
      assembleOutput(
        ['id', 'fields'],
        [
          ['3', 'c'],
          ['1', 'a'],
        ],
      ),
    ).toEqual([
      ['id', 'fields'],
      ['3', 'c'],
      ['1', 'a'],
    ]);
  });

  it('returns only the header when nothing was retained', () => {
    expect(assembleOutput(['id'], [])).toEqual([['id']]);
  });

  it('returns nothing without a header', () => {
    expect(assembleOutput(undefined, [])).toEqual([]);
  });
});
