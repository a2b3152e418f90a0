/**
 * Preprocessing Strategy Set
 *
 * Produces independent OCR candidates from one masked image. Every strategy
 * starts from the same grayscale plane; none reads another's output.
 *
 * Order matters: it is also the consensus tie-break order.
 *   adaptive → adaptive (inverted) → otsu → otsu (inverted) → contrast
 */

import {
  type CandidateImage,
  type MaskedImage,
  type PreprocessConfig,
  STRATEGY_ORDER,
  type StrategyId,
} from '../0_types.js';
import { ImageDecodeError } from '../errors.js';

export type PreprocessOptions = Partial<
  Pick<
    PreprocessConfig,
    'strategies' | 'adaptiveBlockSize' | 'adaptiveOffset' | 'contrastFactor'
  >
>;

export interface GrayPlane {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Always generated, whatever the configuration asks for */
const REQUIRED_STRATEGIES: readonly StrategyId[] = [
  'adaptive-threshold',
  'adaptive-threshold-inverted',
];

// =============================================================================
// PIXEL OPERATIONS
// =============================================================================

function luminance(r: number, g: number, b: number): number {
  return Math.round(0.299 * r + 0.587 * g + 0.114 * b);
}

function medianOfHistogram(histogram: Uint32Array, count: number): number {
  const half = Math.ceil(count / 2);
  let acc = 0;
  for (let v = 0; v < 256; v++) {
    acc += histogram[v];
    if (acc >= half) return v;
  }
  return 255;
}

/**
 * Luminance of covered pixels. Transparent (uncovered) pixels take the
 * median luminance of the covered ones, or white when nothing is covered.
 */
export function toGrayscale(image: MaskedImage): GrayPlane {
  const { width, height, data } = image;
  const gray = new Uint8Array(width * height);
  const histogram = new Uint32Array(256);
  let covered = 0;

  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    if (data[o + 3] === 0) continue;
    const v = luminance(data[o], data[o + 1], data[o + 2]);
    gray[i] = v;
    histogram[v]++;
    covered++;
  }

  const background = covered > 0 ? medianOfHistogram(histogram, covered) : 255;
  for (let i = 0; i < width * height; i++) {
    if (data[i * 4 + 3] === 0) gray[i] = background;
  }

  return { width, height, data: gray };
}

/** 3x3 median with edge replication */
export function medianFilter3(plane: GrayPlane): GrayPlane {
  const { width, height, data } = plane;
  const out = new Uint8Array(width * height);
  const window = new Array<number>(9);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let n = 0;
      for (let dy = -1; dy <= 1; dy++) {
        const yy = Math.min(Math.max(y + dy, 0), height - 1);
        for (let dx = -1; dx <= 1; dx++) {
          const xx = Math.min(Math.max(x + dx, 0), width - 1);
          window[n++] = data[yy * width + xx];
        }
      }
      window.sort((a, b) => a - b);
      out[y * width + x] = window[4];
    }
  }

  return { width, height, data: out };
}

/**
 * Local mean threshold: a pixel is white when it is brighter than the mean
 * of its block (clipped at the borders) minus `offset`.
 */
export function adaptiveThreshold(
  plane: GrayPlane,
  blockSize: number,
  offset: number
): GrayPlane {
  const { width, height, data } = plane;
  const radius = Math.floor(blockSize / 2);
  const stride = width + 1;
  const integral = new Float64Array(stride * (height + 1));

  for (let y = 0; y < height; y++) {
    let rowSum = 0;
    for (let x = 0; x < width; x++) {
      rowSum += data[y * width + x];
      integral[(y + 1) * stride + (x + 1)] = integral[y * stride + (x + 1)] + rowSum;
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const y0 = Math.max(y - radius, 0);
    const y1 = Math.min(y + radius, height - 1) + 1;
    for (let x = 0; x < width; x++) {
      const x0 = Math.max(x - radius, 0);
      const x1 = Math.min(x + radius, width - 1) + 1;
      const sum =
        integral[y1 * stride + x1] -
        integral[y0 * stride + x1] -
        integral[y1 * stride + x0] +
        integral[y0 * stride + x0];
      const mean = sum / ((y1 - y0) * (x1 - x0));
      out[y * width + x] = data[y * width + x] > mean - offset ? 255 : 0;
    }
  }

  return { width, height, data: out };
}

/** Cutoff maximising between-class variance; uniform input yields 0 */
export function otsuLevel(plane: GrayPlane): number {
  const histogram = new Uint32Array(256);
  for (const v of plane.data) histogram[v]++;

  const total = plane.data.length;
  let sumAll = 0;
  for (let v = 0; v < 256; v++) sumAll += v * histogram[v];

  let sumBackground = 0;
  let weightBackground = 0;
  let bestVariance = 0;
  let level = 0;

  for (let t = 0; t < 256; t++) {
    weightBackground += histogram[t];
    if (weightBackground === 0) continue;
    const weightForeground = total - weightBackground;
    if (weightForeground === 0) break;

    sumBackground += t * histogram[t];
    const meanBackground = sumBackground / weightBackground;
    const meanForeground = (sumAll - sumBackground) / weightForeground;
    const between =
      weightBackground *
      weightForeground *
      (meanBackground - meanForeground) ** 2;

    if (between > bestVariance) {
      bestVariance = between;
      level = t;
    }
  }

  return level;
}

export function globalThreshold(plane: GrayPlane, level: number): GrayPlane {
  const out = new Uint8Array(plane.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = plane.data[i] > level ? 255 : 0;
  }
  return { ...plane, data: out };
}

/** Scales the distance from the mean luminance by `factor` */
export function enhanceContrast(plane: GrayPlane, factor: number): GrayPlane {
  let sum = 0;
  for (const v of plane.data) sum += v;
  const mean = plane.data.length > 0 ? sum / plane.data.length : 0;

  const out = new Uint8Array(plane.data.length);
  for (let i = 0; i < out.length; i++) {
    const v = Math.round(mean + factor * (plane.data[i] - mean));
    out[i] = Math.min(Math.max(v, 0), 255);
  }
  return { ...plane, data: out };
}

export function invert(plane: GrayPlane): GrayPlane {
  const out = new Uint8Array(plane.data.length);
  for (let i = 0; i < out.length; i++) out[i] = 255 - plane.data[i];
  return { ...plane, data: out };
}

// =============================================================================
// STRATEGIES
// =============================================================================

type StrategyFn = (gray: GrayPlane, options: Required<PreprocessOptions>) => GrayPlane;

const adaptive: StrategyFn = (gray, o) =>
  adaptiveThreshold(medianFilter3(gray), o.adaptiveBlockSize, o.adaptiveOffset);

const otsu: StrategyFn = (gray) => globalThreshold(gray, otsuLevel(gray));

const STRATEGIES: Record<StrategyId, StrategyFn> = {
  'adaptive-threshold': adaptive,
  'adaptive-threshold-inverted': (gray, o) => invert(adaptive(gray, o)),
  'otsu-threshold': otsu,
  'otsu-threshold-inverted': (gray, o) => invert(otsu(gray, o)),
  contrast: (gray, o) => enhanceContrast(gray, o.contrastFactor),
};

export function resolveStrategies(requested: readonly StrategyId[]): StrategyId[] {
  const wanted = new Set<StrategyId>([...REQUIRED_STRATEGIES, ...requested]);
  return STRATEGY_ORDER.filter((id) => wanted.has(id));
}

export function assertDecodable(image: MaskedImage): void {
  const expected = image.width * image.height * 4;
  if (image.width < 1 || image.height < 1 || image.data.length !== expected) {
    throw new ImageDecodeError(
      `Masked image buffer is ${image.data.length} bytes, expected ${expected} for ${image.width}x${image.height} RGBA`
    );
  }
}

/**
 * Generates candidates in the fixed strategy order.
 * Throws ImageDecodeError when the masked image itself is unreadable.
 */
export function generateCandidates(
  image: MaskedImage,
  options: PreprocessOptions = {}
): CandidateImage[] {
  assertDecodable(image);

  const resolved: Required<PreprocessOptions> = {
    strategies: options.strategies ?? [...STRATEGY_ORDER],
    adaptiveBlockSize: options.adaptiveBlockSize ?? 11,
    adaptiveOffset: options.adaptiveOffset ?? 2,
    contrastFactor: options.contrastFactor ?? 1.5,
  };
  const gray = toGrayscale(image);

  return resolveStrategies(resolved.strategies).map((strategyId) => {
    const plane = STRATEGIES[strategyId](gray, resolved);
    return {
      strategyId,
      width: plane.width,
      height: plane.height,
      data: Buffer.from(plane.data.buffer, plane.data.byteOffset, plane.data.length),
    };
  });
}
