export const CELL_TYPES = ['AZ', 'TK', 'RR', 'AR', 'LAR', 'USP'] as const;

export type CellType = (typeof CELL_TYPES)[number];

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface CellClass {
  readonly type: CellType;
  readonly description: string;
  readonly rgb: Readonly<RGB>;
  readonly expectedCount: number;
}

/**
 * Decoded pixels, row-major. Pixel (x, y) starts at `(y * width + x) * channels`.
 */
export interface RasterImage {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
}

export interface PixelBlob {
  centerX: number;
  centerY: number;
  area: number;
}

export interface Cell {
  readonly gridX: number;
  readonly gridY: number;
  readonly originalGridX: number;
  readonly originalGridY: number;
  readonly pixelX: number;
  readonly pixelY: number;
  readonly area: number;
}

export type CellsByType = Record<CellType, Cell[]>;

export interface GridIndex {
  values: number[];
  rankOf: Map<number, number>;
}

export interface Size {
  width: number;
  height: number;
}

export interface SchemeMetadata {
  imageSize: Size;
  cellSize: number;
  minArea: number;
  colorTolerance: number;
  totalCells: number;
  gridSize: Size;
}

export interface SchemeOutput {
  metadata: SchemeMetadata;
  cells: CellsByType;
  positionsByType: Record<CellType, string[]>;
}

export interface ParseOptions {
  cellSize: number;
  minArea: number;
  colorTolerance: number;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export function emptyCellsByType(): CellsByType {
  return { AZ: [], TK: [], RR: [], AR: [], LAR: [], USP: [] };
}
