/**
 * Image codec backed by sharp.
 *
 * Everything past decoding works on raw RGBA / gray buffers; sharp only
 * reads screenshots and writes PNGs.
 */

import sharp from 'sharp';
import type { DecodedImage, ImageCodec } from '../0_types.js';
import { ImageDecodeError } from '../errors.js';

export function createSharpImageCodec(): ImageCodec {
  return {
    decodeFile: async (filePath) => {
      try {
        const { data, info } = await sharp(filePath)
          .rotate()
          .toColourspace('srgb')
          .ensureAlpha()
          .raw()
          .toBuffer({ resolveWithObject: true });

        if (info.channels !== 4) {
          throw new Error(`expected 4 channels, got ${info.channels}`);
        }
        const image: DecodedImage = {
          width: info.width,
          height: info.height,
          channels: 4,
          data,
        };
        return image;
      } catch (error) {
        throw new ImageDecodeError(`Failed to decode ${filePath}`, {
          cause: error,
        });
      }
    },

    writeRgbaPng: async (image, filePath) => {
      await sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: 4 },
      })
        .png()
        .toFile(filePath);
    },

    writeGrayPng: async (candidate, filePath) => {
      await sharp(candidate.data, {
        raw: { width: candidate.width, height: candidate.height, channels: 1 },
      })
        .png({ compressionLevel: 6 })
        .toFile(filePath);
    },
  };
}
