import sharp from 'sharp';
import { ImageDecodeError } from './errors';
import type { RasterImage, RGB } from './types';

export class ImageLoader {
  /**
   * Decode an image into 8-bit sRGB pixels. Alpha is dropped and
   * greyscale or palette images are expanded to three channels.
   */
  static async load(imagePath: string): Promise<RasterImage> {
    try {
      const { data, info } = await sharp(imagePath)
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer({ resolveWithObject: true });

      return {
        width: info.width,
        height: info.height,
        channels: info.channels,
        data: new Uint8Array(data.buffer, data.byteOffset, data.length)
      };
    } catch (error) {
      throw new ImageDecodeError(imagePath, error);
    }
  }

  /**
   * Get pixel color at specific coordinates
   */
  static getPixel(image: RasterImage, x: number, y: number): RGB {
    const pixelIndex = (y * image.width + x) * image.channels;
    return {
      r: image.data[pixelIndex],
      g: image.data[pixelIndex + 1],
      b: image.data[pixelIndex + 2]
    };
  }
}
