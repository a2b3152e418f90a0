/**
 * Mask & Crop Engine
 *
 * Crops a full frame to the selection's bounding box and clears every pixel
 * the selection does not cover. Cleared pixels are fully transparent
 * (all four channels 0).
 */

import type { DecodedImage, MaskedImage, RegionPath } from '../0_types.js';
import { boundingBoxOf, buildCoverageMask, clampBox } from '../domain/region.js';

export interface MaskOptions {
  /** Polygons enclosing less than this share of their box use the inscribed ellipse */
  degenerateAreaRatio?: number;
}

export function maskAndCrop(
  raw: DecodedImage,
  path: RegionPath,
  options: MaskOptions = {}
): MaskedImage {
  const box = clampBox(boundingBoxOf(path), raw.width, raw.height);
  const coverage = buildCoverageMask(
    path,
    box,
    options.degenerateAreaRatio ?? 0.01
  );

  const data = Buffer.alloc(box.width * box.height * 4);
  for (let row = 0; row < box.height; row++) {
    const srcRow = (box.y + row) * raw.width + box.x;
    for (let col = 0; col < box.width; col++) {
      if (coverage.cells[row * box.width + col] === 0) continue;
      const src = (srcRow + col) * 4;
      raw.data.copy(data, (row * box.width + col) * 4, src, src + 4);
    }
  }

  return {
    width: box.width,
    height: box.height,
    channels: 4,
    data,
    origin: { x: box.x, y: box.y },
    coverage: {
      insidePixels: coverage.insidePixels,
      fallback: coverage.fallback,
    },
  };
}

export function isEmptyPixel(image: DecodedImage, x: number, y: number): boolean {
  const i = (y * image.width + x) * 4;
  return (
    image.data[i] === 0 &&
    image.data[i + 1] === 0 &&
    image.data[i + 2] === 0 &&
    image.data[i + 3] === 0
  );
}
