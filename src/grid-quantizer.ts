import type { Cell, PixelBlob } from './types';

export function quantize(centerX: number, centerY: number, cellSize: number): { gridX: number; gridY: number } {
  return {
    gridX: Math.trunc(centerX / cellSize),
    gridY: Math.trunc(centerY / cellSize)
  };
}

/**
 * Raw cell for a blob; original and current grid coordinates coincide
 * until the coordinate space is normalized.
 */
export function toCell(blob: PixelBlob, cellSize: number): Cell {
  const { gridX, gridY } = quantize(blob.centerX, blob.centerY, cellSize);
  return {
    gridX,
    gridY,
    originalGridX: gridX,
    originalGridY: gridY,
    pixelX: Math.trunc(blob.centerX),
    pixelY: Math.trunc(blob.centerY),
    area: blob.area
  };
}
