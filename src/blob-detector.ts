import { ColorMatcher } from './color-matcher';
import { ImageLoader } from './image-loader';
import type { PixelBlob, RasterImage, RGB } from './types';

export class BlobDetector {
  /**
   * Find every 4-connected region of pixels matching the target color.
   * Regions are returned in raster order of their first pixel; no area
   * filter is applied here.
   */
  static findConnectedComponents(image: RasterImage, targetColor: RGB, tolerance: number): PixelBlob[] {
    const { width, height } = image;
    const pixelCount = width * height;
    const components: PixelBlob[] = [];

    // Each pixel is enqueued at most once, so a flat queue of pixelCount suffices
    const visited = new Uint8Array(pixelCount);
    const queue = new Int32Array(pixelCount);

    const matches = (x: number, y: number): boolean =>
      ColorMatcher.matchesColor(ImageLoader.getPixel(image, x, y), targetColor, tolerance);

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const start = y * width + x;
        if (visited[start] || !matches(x, y)) {
          continue;
        }

        let head = 0;
        let tail = 0;
        let sumX = 0;
        let sumY = 0;
        let area = 0;

        visited[start] = 1;
        queue[tail++] = start;

        while (head < tail) {
          const index = queue[head++];
          const px = index % width;
          const py = (index - px) / width;

          sumX += px;
          sumY += py;
          area++;

          const neighbors: Array<[number, number]> = [
            [px + 1, py],
            [px - 1, py],
            [px, py + 1],
            [px, py - 1]
          ];

          for (const [nx, ny] of neighbors) {
            if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;
            const neighborIndex = ny * width + nx;
            if (visited[neighborIndex] || !matches(nx, ny)) continue;

            visited[neighborIndex] = 1;
            queue[tail++] = neighborIndex;
          }
        }

        components.push({
          centerX: sumX / area,
          centerY: sumY / area,
          area
        });
      }
    }

    return components;
  }
}
