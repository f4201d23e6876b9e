import type { CellClass, ParseOptions } from './types';

/**
 * Reference colors of the channel types on the core layout diagram.
 * Order matters: pixels are assigned to the first class that matches.
 */
export const CELL_CLASSES: readonly CellClass[] = [
  { type: 'AZ', description: 'Emergency protection rods', rgb: { r: 0xde, g: 0x1a, b: 0x03 }, expectedCount: 33 },
  { type: 'TK', description: 'Fuel channels', rgb: { r: 0xa5, g: 0xb5, b: 0xa4 }, expectedCount: 1661 },
  { type: 'RR', description: 'Manual control rods', rgb: { r: 0xeb, g: 0xeb, b: 0xeb }, expectedCount: 146 },
  { type: 'AR', description: 'Automatic control rods', rgb: { r: 0x01, g: 0xb1, b: 0x91 }, expectedCount: 8 },
  { type: 'LAR', description: 'Local automatic control rods', rgb: { r: 0x00, g: 0x67, b: 0xce }, expectedCount: 12 },
  { type: 'USP', description: 'Shortened absorber rods', rgb: { r: 0xfe, g: 0xd8, b: 0x01 }, expectedCount: 24 },
];

export const DEFAULT_OPTIONS: Readonly<ParseOptions> = {
  cellSize: 26,
  minArea: 100,
  colorTolerance: 25,
};

/**
 * Convert RGB to hex color
 */
export function rgbToHex(r: number, g: number, b: number): string {
  return `#${((1 << 24) + (r << 16) + (g << 8) + b).toString(16).slice(1).toUpperCase()}`;
}
