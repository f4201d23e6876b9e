import fs from 'fs';
import path from 'path';
import { CELL_TYPES } from './types';
import type { CellsByType, CellType, Logger, SchemeMetadata, SchemeOutput } from './types';

export interface OutputPaths {
  jsonPath: string;
  listingPath: string;
}

/**
 * JSON goes beside the image unless overridden; the listing always sits
 * beside the JSON with a .ts extension.
 */
export function resolveOutputPaths(imagePath: string, jsonPath?: string): OutputPaths {
  const resolvedJsonPath = jsonPath ?? replaceExtension(imagePath, '.json');
  return {
    jsonPath: resolvedJsonPath,
    listingPath: replaceExtension(resolvedJsonPath, '.ts')
  };
}

function replaceExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

function positionKey(x: number, y: number): string {
  return `${x},${y}`;
}

export class ReportGenerator {
  private logger: Logger;

  constructor(logger: Logger = console) {
    this.logger = logger;
  }

  static buildSchemeOutput(cells: CellsByType, metadata: SchemeMetadata): SchemeOutput {
    const positions = (cellType: CellType): string[] =>
      cells[cellType].map(cell => positionKey(cell.gridX, cell.gridY));

    const positionsByType: Record<CellType, string[]> = {
      AZ: positions('AZ'),
      TK: positions('TK'),
      RR: positions('RR'),
      AR: positions('AR'),
      LAR: positions('LAR'),
      USP: positions('USP')
    };

    return { metadata, cells, positionsByType };
  }

  /**
   * Render one `Set<string>` literal per non-empty cell type, grouped by row.
   * Row comments are for review only; the set contents are the same either way.
   */
  static generateTypeScript(cells: CellsByType): string {
    const lines: string[] = [
      '// Auto-generated from a core layout scheme image',
      '// Cell positions extracted by core-scheme-parser',
      '// Coordinates are normalized to a continuous grid (grid lines removed)',
      ''
    ];

    for (const cellType of CELL_TYPES) {
      const positions = cells[cellType];
      if (positions.length === 0) {
        continue;
      }

      lines.push(`// ${cellType} positions - ${positions.length} cells`);
      lines.push(`const ${cellType.toLowerCase()}Positions = new Set<string>([`);

      const byRow = new Map<number, Set<number>>();
      for (const cell of positions) {
        const row = byRow.get(cell.gridY) ?? new Set<number>();
        row.add(cell.gridX);
        byRow.set(cell.gridY, row);
      }

      const rows = Array.from(byRow.keys()).sort((a, b) => a - b);
      for (const row of rows) {
        const cols = Array.from(byRow.get(row) ?? []).sort((a, b) => a - b);
        const posStr = cols.map(col => `'${positionKey(col, row)}'`).join(', ');
        lines.push(`    // Row ${row}`);
        lines.push(`    ${posStr},`);
      }

      lines.push(']);');
      lines.push('');
    }

    return lines.join('\n');
  }

  /**
   * Write both outputs, overwriting existing files. A failure on the
   * listing leaves the already-written JSON in place.
   */
  public write(output: SchemeOutput, paths: OutputPaths): void {
    fs.writeFileSync(paths.jsonPath, JSON.stringify(output, null, 2), 'utf-8');
    this.logger.log(`💾 Output saved to: ${paths.jsonPath}`);

    fs.writeFileSync(paths.listingPath, ReportGenerator.generateTypeScript(output.cells), 'utf-8');
    this.logger.log(`💾 TypeScript code saved to: ${paths.listingPath}`);
  }
}
