#!/usr/bin/env node
import { runCli } from './cli';

export { SchemeParser } from './scheme-parser';
export { ColorMatcher } from './color-matcher';
export { BlobDetector } from './blob-detector';
export { CoordinateNormalizer, buildGridIndex } from './coordinate-normalizer';
export { ReportGenerator, resolveOutputPaths } from './report-generator';
export { quantize, toCell } from './grid-quantizer';
export { ImageLoader } from './image-loader';
export { CELL_CLASSES, DEFAULT_OPTIONS } from './cell-classes';
export { UsageError, ImageDecodeError } from './errors';
export { CELL_TYPES } from './types';
export type * from './types';

// Run the main function
if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('❌ Unexpected error:', error);
      process.exitCode = 1;
    });
}
