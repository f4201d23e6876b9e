import sharp from 'sharp';
import { CELL_CLASSES } from '../src/cell-classes';
import type { Cell, CellClass, CellType, RasterImage, RGB } from '../src/types';

export const WHITE: RGB = { r: 255, g: 255, b: 255 };

export function createRaster(width: number, height: number, fill: RGB = WHITE, channels: number = 3): RasterImage {
  const data = new Uint8Array(width * height * channels);
  for (let i = 0; i < width * height; i++) {
    data[i * channels] = fill.r;
    data[i * channels + 1] = fill.g;
    data[i * channels + 2] = fill.b;
    if (channels === 4) {
      data[i * channels + 3] = 255;
    }
  }
  return { width, height, channels, data };
}

export function fillRect(image: RasterImage, x: number, y: number, width: number, height: number, color: RGB): void {
  for (let py = y; py < y + height; py++) {
    for (let px = x; px < x + width; px++) {
      const index = (py * image.width + px) * image.channels;
      image.data[index] = color.r;
      image.data[index + 1] = color.g;
      image.data[index + 2] = color.b;
    }
  }
}

export async function savePng(image: RasterImage, filePath: string): Promise<void> {
  await sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: image.channels === 4 ? 4 : 3 }
  })
    .png()
    .toFile(filePath);
}

export function createCell(gridX: number, gridY: number, area: number = 100): Cell {
  return {
    gridX,
    gridY,
    originalGridX: gridX,
    originalGridY: gridY,
    pixelX: gridX * 26 + 12,
    pixelY: gridY * 26 + 12,
    area
  };
}

export function getCellClass(type: CellType): CellClass {
  const cellClass = CELL_CLASSES.find(c => c.type === type);
  if (!cellClass) {
    throw new Error(`Unknown cell type: ${type}`);
  }
  return cellClass;
}
