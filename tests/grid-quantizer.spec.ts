import { describe, it, expect } from 'vitest';
import { quantize, toCell } from '../src/grid-quantizer';

describe('quantize', () => {
  it('truncates centroids to grid cells', () => {
    expect(quantize(12.5, 12.5, 26)).toEqual({ gridX: 0, gridY: 0 });
    expect(quantize(25.99, 26, 26)).toEqual({ gridX: 0, gridY: 1 });
    expect(quantize(77.9, 130, 26)).toEqual({ gridX: 2, gridY: 5 });
  });
});

describe('toCell', () => {
  it('keeps raw coordinates as the original grid position', () => {
    expect(toCell({ centerX: 64.5, centerY: 38.75, area: 120 }, 26)).toEqual({
      gridX: 2,
      gridY: 1,
      originalGridX: 2,
      originalGridY: 1,
      pixelX: 64,
      pixelY: 38,
      area: 120
    });
  });
});
