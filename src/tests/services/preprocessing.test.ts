import { describe, expect, it } from 'vitest';
import type { MaskedImage } from '../../0_types.js';
import { ImageDecodeError } from '../../errors.js';
import {
  enhanceContrast,
  generateCandidates,
  globalThreshold,
  medianFilter3,
  otsuLevel,
  resolveStrategies,
  toGrayscale,
} from '../../services/preprocessing.js';

function masked(
  width: number,
  height: number,
  pixel: (x: number, y: number) => [number, number, number, number]
): MaskedImage {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data.set(pixel(x, y), (y * width + x) * 4);
    }
  }
  return {
    width,
    height,
    channels: 4,
    data,
    origin: { x: 0, y: 0 },
    coverage: { insidePixels: width * height, fallback: 'none' },
  };
}

/** Dark vertical bar (x 8..10, y 5..14) on a mid-gray background */
const barImage = masked(20, 20, (x, y) =>
  x >= 8 && x <= 10 && y >= 5 && y <= 14 ? [50, 50, 50, 255] : [200, 200, 200, 255]
);

describe('toGrayscale', () => {
  it('fills uncovered pixels with the median of covered luminance', () => {
    const image = masked(3, 1, (x) =>
      x === 0 ? [255, 0, 0, 255] : x === 1 ? [0, 255, 0, 255] : [0, 0, 0, 0]
    );
    expect([...toGrayscale(image).data]).toEqual([76, 150, 76]);
  });

  it('uses white when nothing is covered', () => {
    const image = masked(2, 2, () => [0, 0, 0, 0]);
    expect([...toGrayscale(image).data]).toEqual([255, 255, 255, 255]);
  });
});

describe('pixel operations', () => {
  it('medianFilter3 removes an isolated spike', () => {
    const plane = { width: 3, height: 3, data: new Uint8Array([0, 0, 0, 0, 255, 0, 0, 0, 0]) };
    expect([...medianFilter3(plane).data]).toEqual(new Array(9).fill(0));
  });

  it('otsuLevel splits a two-tone plane at the lower tone', () => {
    const plane = { width: 4, height: 1, data: new Uint8Array([50, 50, 200, 200]) };
    const level = otsuLevel(plane);
    expect(level).toBe(50);
    expect([...globalThreshold(plane, level).data]).toEqual([0, 0, 255, 255]);
  });

  it('otsuLevel returns 0 for a uniform plane', () => {
    expect(otsuLevel({ width: 2, height: 2, data: new Uint8Array(4).fill(128) })).toBe(0);
  });

  it('enhanceContrast stretches around the mean and clamps', () => {
    const plane = (values: number[]) => ({
      width: values.length,
      height: 1,
      data: new Uint8Array(values),
    });
    expect([...enhanceContrast(plane([100, 200]), 1.5).data]).toEqual([75, 225]);
    expect([...enhanceContrast(plane([0, 255]), 1.5).data]).toEqual([0, 255]);
  });
});

describe('resolveStrategies', () => {
  it('always includes both adaptive variants in fixed order', () => {
    expect(resolveStrategies(['contrast'])).toEqual([
      'adaptive-threshold',
      'adaptive-threshold-inverted',
      'contrast',
    ]);
  });
});

describe('generateCandidates', () => {
  it('produces every strategy in order with the masked dimensions', () => {
    const candidates = generateCandidates(barImage);

    expect(candidates.map((c) => c.strategyId)).toEqual([
      'adaptive-threshold',
      'adaptive-threshold-inverted',
      'otsu-threshold',
      'otsu-threshold-inverted',
      'contrast',
    ]);
    for (const candidate of candidates) {
      expect(candidate.width).toBe(20);
      expect(candidate.height).toBe(20);
      expect(candidate.data.length).toBe(400);
    }
  });

  it('binarises the image instead of passing the grayscale through', () => {
    const [adaptive, inverted] = generateCandidates(barImage);
    const at = (data: Buffer, x: number, y: number) => data[y * 20 + x];

    expect(at(adaptive.data, 9, 10)).toBe(0);
    expect(at(adaptive.data, 2, 2)).toBe(255);
    expect(at(inverted.data, 9, 10)).toBe(255);
    expect(at(inverted.data, 2, 2)).toBe(0);
    expect([...adaptive.data]).not.toEqual([...toGrayscale(barImage).data]);
  });

  it('still yields at least two candidates for a uniform image', () => {
    const candidates = generateCandidates(
      masked(5, 5, () => [128, 128, 128, 255]),
      { strategies: [] }
    );
    expect(candidates).toHaveLength(2);
    expect([...candidates[0].data]).toEqual(new Array(25).fill(255));
  });

  it('rejects a buffer that does not match the dimensions', () => {
    const broken: MaskedImage = { ...barImage, data: Buffer.alloc(10) };
    expect(() => generateCandidates(broken)).toThrow(ImageDecodeError);
  });

  it('rejects an empty image', () => {
    const empty: MaskedImage = { ...barImage, width: 0, height: 0, data: Buffer.alloc(0) };
    expect(() => generateCandidates(empty)).toThrow(ImageDecodeError);
  });
});
