import { describe, expect, it } from 'vitest';
import type { DecodedImage, Point } from '../../0_types.js';
import { containsPoint } from '../../domain/region.js';
import { isEmptyPixel, maskAndCrop } from '../../services/mask-crop.js';

/** Opaque frame whose pixels are never the empty marker */
function frame(width: number, height: number): DecodedImage {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      data[i] = x;
      data[i + 1] = y;
      data[i + 2] = 200;
      data[i + 3] = 255;
    }
  }
  return { width, height, channels: 4, data };
}

const pentagram: Point[] = [
  { x: 10, y: 0 },
  { x: 16, y: 19 },
  { x: 0, y: 7 },
  { x: 20, y: 7 },
  { x: 4, y: 19 },
];

describe('maskAndCrop', () => {
  it('crops a triangle to its bounding box and clears the outside', () => {
    const triangle = [
      { x: 2, y: 2 },
      { x: 8, y: 2 },
      { x: 2, y: 8 },
    ];
    const masked = maskAndCrop(frame(12, 12), triangle);

    expect(masked.width).toBe(7);
    expect(masked.height).toBe(7);
    expect(masked.origin).toEqual({ x: 2, y: 2 });
    expect(masked.data.length).toBe(7 * 7 * 4);
    expect(masked.coverage).toEqual({ insidePixels: 28, fallback: 'none' });

    // (1,1) in crop space is frame pixel (3,3)
    expect([...masked.data.subarray((1 * 7 + 1) * 4, (1 * 7 + 1) * 4 + 4)]).toEqual([
      3, 3, 200, 255,
    ]);
    expect(isEmptyPixel(masked, 6, 6)).toBe(true);
    expect(isEmptyPixel(masked, 6, 0)).toBe(false);
  });

  it('keeps exactly the pixels a self-intersecting star covers', () => {
    const masked = maskAndCrop(frame(24, 24), pentagram);

    expect(masked.width).toBe(21);
    expect(masked.height).toBe(20);
    for (let y = 0; y < masked.height; y++) {
      for (let x = 0; x < masked.width; x++) {
        expect(isEmptyPixel(masked, x, y)).toBe(!containsPoint(pentagram, { x, y }));
      }
    }
    // inner pentagon is kept under the nonzero rule
    expect(isEmptyPixel(masked, 10, 11)).toBe(false);
  });

  it('always keeps the pixels under the path vertices', () => {
    const masked = maskAndCrop(frame(24, 24), pentagram);
    for (const p of pentagram) {
      expect(isEmptyPixel(masked, p.x - masked.origin.x, p.y - masked.origin.y)).toBe(
        false
      );
    }
  });

  it('clips selections that run off the frame', () => {
    const masked = maskAndCrop(frame(10, 10), [
      { x: -5, y: -5 },
      { x: 20, y: -5 },
      { x: 20, y: 20 },
      { x: -5, y: 20 },
    ]);

    expect(masked.origin).toEqual({ x: 0, y: 0 });
    expect(masked.width).toBe(10);
    expect(masked.height).toBe(10);
    expect(masked.coverage.insidePixels).toBe(100);
  });

  it('uses an ellipse for paths that enclose no area', () => {
    const masked = maskAndCrop(frame(10, 10), [
      { x: 0, y: 0 },
      { x: 8, y: 8 },
      { x: 8, y: 0 },
      { x: 0, y: 8 },
    ]);

    expect(masked.coverage.fallback).toBe('ellipse');
    expect(isEmptyPixel(masked, 4, 4)).toBe(false);
    expect(isEmptyPixel(masked, 1, 0)).toBe(true);
  });

  it('only walks the part of a huge edge that lies inside the frame', () => {
    const started = performance.now();
    const masked = maskAndCrop(frame(20, 20), [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 5, y: 300_000_000 },
    ]);

    expect(performance.now() - started).toBeLessThan(1000);
    expect(masked.width).toBe(11);
    expect(masked.height).toBe(20);
    expect(masked.coverage.fallback).toBe('none');
    expect(isEmptyPixel(masked, 0, 0)).toBe(false);
    expect(isEmptyPixel(masked, 10, 0)).toBe(false);
    expect(isEmptyPixel(masked, 5, 19)).toBe(false);
  });
});
