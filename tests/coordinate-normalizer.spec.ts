import { describe, it, expect } from 'vitest';
import { CoordinateNormalizer, buildGridIndex } from '../src/coordinate-normalizer';
import { emptyCellsByType } from '../src/types';
import { createCell } from './helpers';

describe('buildGridIndex', () => {
  it('ranks distinct values in ascending order', () => {
    const index = buildGridIndex([9, 2, 5, 2, 9]);
    expect(index.values).toEqual([2, 5, 9]);
    expect(index.rankOf.get(2)).toBe(0);
    expect(index.rankOf.get(5)).toBe(1);
    expect(index.rankOf.get(9)).toBe(2);
  });
});

describe('CoordinateNormalizer', () => {
  it('closes gaps left by grid lines while preserving order', () => {
    const cells = emptyCellsByType();
    cells.TK.push(createCell(2, 0), createCell(9, 4));
    cells.AZ.push(createCell(5, 4));

    const result = CoordinateNormalizer.normalize(cells);

    expect(result.cells.TK.map(c => [c.gridX, c.gridY])).toEqual([
      [0, 0],
      [2, 1]
    ]);
    expect(result.cells.AZ.map(c => [c.gridX, c.gridY])).toEqual([[1, 1]]);
    expect(result.cells.TK[1].originalGridX).toBe(9);
    expect(result.cells.TK[1].originalGridY).toBe(4);
    expect(result.cells.TK[1].pixelX).toBe(9 * 26 + 12);
    expect(CoordinateNormalizer.gridSize(result)).toEqual({ width: 3, height: 2 });
  });

  it('does not mutate the input cells', () => {
    const cells = emptyCellsByType();
    cells.RR.push(createCell(4, 6));

    CoordinateNormalizer.normalize(cells);

    expect(cells.RR[0].gridX).toBe(4);
    expect(cells.RR[0].gridY).toBe(6);
  });

  it('is the identity on an already dense grid', () => {
    const cells = emptyCellsByType();
    cells.TK.push(createCell(2, 0), createCell(9, 4));
    cells.AZ.push(createCell(5, 4));

    const once = CoordinateNormalizer.normalize(cells);
    const twice = CoordinateNormalizer.normalize(once.cells);

    expect(twice.cells).toEqual(once.cells);
  });

  it('reports an empty grid when there are no cells', () => {
    const result = CoordinateNormalizer.normalize(emptyCellsByType());
    expect(result.cells).toEqual(emptyCellsByType());
    expect(CoordinateNormalizer.gridSize(result)).toEqual({ width: 0, height: 0 });
  });
});
