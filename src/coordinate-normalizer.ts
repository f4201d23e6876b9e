import { CELL_TYPES, emptyCellsByType } from './types';
import type { CellsByType, GridIndex, Size } from './types';

export interface NormalizationResult {
  cells: CellsByType;
  xIndex: GridIndex;
  yIndex: GridIndex;
}

export function buildGridIndex(values: Iterable<number>): GridIndex {
  const sorted = Array.from(new Set(values)).sort((a, b) => a - b);
  const rankOf = new Map<number, number>();
  sorted.forEach((value, rank) => rankOf.set(value, rank));
  return { values: sorted, rankOf };
}

/**
 * Grid lines in the diagram occupy coordinate slots that never hold a cell.
 * Normalizing replaces each occupied grid value with its rank among all
 * occupied values on that axis, giving a dense 0-based grid.
 */
export class CoordinateNormalizer {
  static normalize(cells: CellsByType): NormalizationResult {
    const allX: number[] = [];
    const allY: number[] = [];

    for (const cellType of CELL_TYPES) {
      for (const cell of cells[cellType]) {
        allX.push(cell.gridX);
        allY.push(cell.gridY);
      }
    }

    const xIndex = buildGridIndex(allX);
    const yIndex = buildGridIndex(allY);
    const normalized = emptyCellsByType();

    for (const cellType of CELL_TYPES) {
      normalized[cellType] = cells[cellType].map(cell => ({
        ...cell,
        gridX: CoordinateNormalizer.rank(xIndex, cell.gridX),
        gridY: CoordinateNormalizer.rank(yIndex, cell.gridY)
      }));
    }

    return { cells: normalized, xIndex, yIndex };
  }

  static gridSize(result: NormalizationResult): Size {
    return {
      width: result.xIndex.values.length,
      height: result.yIndex.values.length
    };
  }

  private static rank(index: GridIndex, value: number): number {
    const rank = index.rankOf.get(value);
    if (rank === undefined) {
      throw new Error(`Grid value ${value} missing from coordinate index`);
    }
    return rank;
  }
}
