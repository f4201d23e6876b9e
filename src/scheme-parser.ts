import { BlobDetector } from './blob-detector';
import { CELL_CLASSES, DEFAULT_OPTIONS, rgbToHex } from './cell-classes';
import { ColorMatcher } from './color-matcher';
import { CoordinateNormalizer } from './coordinate-normalizer';
import { toCell } from './grid-quantizer';
import { ImageLoader } from './image-loader';
import { ReportGenerator, resolveOutputPaths } from './report-generator';
import type { OutputPaths } from './report-generator';
import { CELL_TYPES, emptyCellsByType } from './types';
import type { CellClass, CellsByType, CellType, Logger, ParseOptions, RasterImage, SchemeOutput } from './types';

export interface CountMismatch {
  type: CellType;
  expected: number;
  actual: number;
}

export interface SchemeRunResult {
  output: SchemeOutput;
  paths: OutputPaths;
}

export class SchemeParser {
  private options: ParseOptions;
  private cellClasses: readonly CellClass[];
  private logger: Logger;

  constructor(
    options: Partial<ParseOptions> = {},
    logger: Logger = console,
    cellClasses: readonly CellClass[] = CELL_CLASSES
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = logger;
    this.cellClasses = cellClasses;
  }

  /**
   * Decode the image, extract cells and write the JSON and TypeScript outputs.
   */
  async run(imagePath: string, jsonPath?: string): Promise<SchemeRunResult> {
    this.logger.log(`📄 Loading image: ${imagePath}`);
    const image = await ImageLoader.load(imagePath);
    this.logger.log(`📐 Image size: ${image.width}x${image.height}`);

    const output = this.parseImage(image);

    const paths = resolveOutputPaths(imagePath, jsonPath);
    new ReportGenerator(this.logger).write(output, paths);

    return { output, paths };
  }

  parseImage(image: RasterImage): SchemeOutput {
    const { cellSize, minArea, colorTolerance } = this.options;

    for (const pair of ColorMatcher.findAmbiguousPairs(this.cellClasses, colorTolerance)) {
      this.logger.warn(
        `⚠️  ${pair.first} and ${pair.second} are ${pair.distance} apart; pixels between them go to ${pair.first}`
      );
    }

    const rawCells = this.detectCells(image);
    this.printStatistics('Raw Cell Statistics', rawCells);

    const normalization = CoordinateNormalizer.normalize(rawCells);
    const gridSize = CoordinateNormalizer.gridSize(normalization);
    const { xIndex, yIndex } = normalization;

    if (xIndex.values.length > 0 && yIndex.values.length > 0) {
      this.logger.log('\n📏 Coordinate normalization:');
      this.logger.log(
        `   Original X range: ${xIndex.values[0]} - ${xIndex.values[xIndex.values.length - 1]} (${xIndex.values.length} unique values)`
      );
      this.logger.log(
        `   Original Y range: ${yIndex.values[0]} - ${yIndex.values[yIndex.values.length - 1]} (${yIndex.values.length} unique values)`
      );
      this.logger.log(`   New X range: 0 - ${xIndex.values.length - 1}`);
      this.logger.log(`   New Y range: 0 - ${yIndex.values.length - 1}`);
    } else {
      this.logger.warn('⚠️  No cells detected, grid is empty');
    }

    const totalCells = this.printStatistics('Normalized Cell Statistics', normalization.cells);
    this.logger.log(`📐 Grid size: ${gridSize.width} x ${gridSize.height}`);

    for (const mismatch of this.findCountMismatches(normalization.cells)) {
      this.logger.warn(`⚠️  ${mismatch.type}: expected ${mismatch.expected} cells, found ${mismatch.actual}`);
    }

    return ReportGenerator.buildSchemeOutput(normalization.cells, {
      imageSize: { width: image.width, height: image.height },
      cellSize,
      minArea,
      colorTolerance,
      totalCells,
      gridSize
    });
  }

  /**
   * One full flood-fill pass per class; blobs below the minimum area are
   * anti-aliasing fringes and are dropped.
   */
  detectCells(image: RasterImage): CellsByType {
    const { cellSize, minArea, colorTolerance } = this.options;
    const cells = emptyCellsByType();

    for (const cellClass of this.cellClasses) {
      const { r, g, b } = cellClass.rgb;
      this.logger.log(`🔍 Finding ${cellClass.type} cells (color: ${rgbToHex(r, g, b)})...`);

      const components = BlobDetector.findConnectedComponents(image, cellClass.rgb, colorTolerance);
      const kept = components.filter(component => component.area >= minArea);
      cells[cellClass.type].push(...kept.map(component => toCell(component, cellSize)));

      if (components.length > kept.length) {
        this.logger.log(`   Discarded ${components.length - kept.length} blobs smaller than ${minArea}px`);
      }
    }

    return cells;
  }

  findCountMismatches(cells: CellsByType): CountMismatch[] {
    return this.cellClasses
      .filter(cellClass => cells[cellClass.type].length !== cellClass.expectedCount)
      .map(cellClass => ({
        type: cellClass.type,
        expected: cellClass.expectedCount,
        actual: cells[cellClass.type].length
      }));
  }

  private printStatistics(title: string, cells: CellsByType): number {
    this.logger.log(`\n=== ${title} ===`);
    let total = 0;
    for (const cellType of CELL_TYPES) {
      const count = cells[cellType].length;
      total += count;
      this.logger.log(`${cellType}: ${count} cells`);
    }
    this.logger.log(`Total: ${total} cells`);
    return total;
  }
}
