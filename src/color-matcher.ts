import { CELL_CLASSES, DEFAULT_OPTIONS } from './cell-classes';
import type { CellClass, CellType, RGB } from './types';

export interface AmbiguousPair {
  first: CellType;
  second: CellType;
  distance: number;
}

export class ColorMatcher {
  private cellClasses: readonly CellClass[];
  private tolerance: number;

  constructor(cellClasses: readonly CellClass[] = CELL_CLASSES, tolerance: number = DEFAULT_OPTIONS.colorTolerance) {
    this.cellClasses = cellClasses;
    this.tolerance = tolerance;
  }

  /**
   * Calculate Euclidean distance between two RGB colors
   */
  static colorDistance(color1: RGB, color2: RGB): number {
    const dr = color1.r - color2.r;
    const dg = color1.g - color2.g;
    const db = color1.b - color2.b;
    return Math.sqrt(dr * dr + dg * dg + db * db);
  }

  static matchesColor(pixel: RGB, target: RGB, tolerance: number = DEFAULT_OPTIONS.colorTolerance): boolean {
    return ColorMatcher.colorDistance(pixel, target) < tolerance;
  }

  /**
   * Find the cell type of a pixel. Classes are tried in order and the first
   * one within tolerance wins, even if a later class is closer.
   */
  public identifyColor(pixel: RGB): CellType | null {
    for (const cellClass of this.cellClasses) {
      if (ColorMatcher.matchesColor(pixel, cellClass.rgb, this.tolerance)) {
        return cellClass.type;
      }
    }
    return null;
  }

  /**
   * Class pairs whose tolerance spheres overlap. A pixel inside both is
   * assigned by class order, not by nearest color.
   */
  static findAmbiguousPairs(
    cellClasses: readonly CellClass[] = CELL_CLASSES,
    tolerance: number = DEFAULT_OPTIONS.colorTolerance
  ): AmbiguousPair[] {
    const pairs: AmbiguousPair[] = [];

    for (let i = 0; i < cellClasses.length; i++) {
      for (let j = i + 1; j < cellClasses.length; j++) {
        const distance = ColorMatcher.colorDistance(cellClasses[i].rgb, cellClasses[j].rgb);
        if (distance < 2 * tolerance) {
          pairs.push({
            first: cellClasses[i].type,
            second: cellClasses[j].type,
            distance: Math.round(distance * 100) / 100
          });
        }
      }
    }

    return pairs;
  }
}
