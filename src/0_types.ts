/**
 * Lasso Search - Core Types
 *
 * All types, config schemas and ports in one place.
 */

import { z } from 'zod';

// =============================================================================
// ENVIRONMENT
// =============================================================================

export const displayServerSchema = z.enum(['x11', 'wayland']);
export type DisplayServer = z.infer<typeof displayServerSchema>;

export interface EnvironmentProfile {
  readonly displayServer: DisplayServer;
  /** Lower-case compositor/desktop token (gnome, kde, sway...), '' when unknown */
  readonly compositorHint: string;
}

// =============================================================================
// CAPTURE
// =============================================================================

/** Priority order of the capture chain, highest first. */
export const CAPTURE_TOOL_KINDS = [
  'portal',
  'desktop',
  'compositor',
  'x11',
] as const;
export type CaptureToolKind = (typeof CAPTURE_TOOL_KINDS)[number];

export interface CaptureToolSpec {
  id: string;
  kind: CaptureToolKind;
  command: string;
  /** `{output}` is replaced with the output file path */
  args: readonly string[];
  displayServer: DisplayServer | 'any';
  /** Only tried when the compositor hint is one of these (or unknown) */
  desktops?: readonly string[];
  timeoutMs?: number;
  packages: PackageNames;
}

export interface PackageNames {
  apt?: string;
  pacman?: string;
}

export interface DecodedImage {
  width: number;
  height: number;
  channels: 4;
  /** RGBA, row-major */
  data: Buffer;
}

export interface RawImage extends DecodedImage {
  sourcePath: string;
  /** Capture tool id, or 'file' for --image */
  provenance: string;
}

export type CaptureFailureReason =
  | 'missing'
  | 'exit'
  | 'timeout'
  | 'empty-output'
  | 'undecodable';

export type CaptureAttempt =
  | { toolId: string; ok: true }
  | { toolId: string; ok: false; reason: CaptureFailureReason; detail?: string };

export type CaptureOutcome =
  | { ok: true; image: RawImage; attempts: CaptureAttempt[] }
  | { ok: false; code: 'CAPTURE_FAILED'; attempts: CaptureAttempt[] };

// =============================================================================
// REGION
// =============================================================================

export interface Point {
  x: number;
  y: number;
}

/** Ordered, implicitly closed polygon in frame coordinates */
export type RegionPath = readonly Point[];

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const pointerEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('press'), x: z.number(), y: z.number() }),
  z.object({ type: z.literal('move'), x: z.number(), y: z.number() }),
  z.object({
    type: z.literal('release'),
    x: z.number().optional(),
    y: z.number().optional(),
  }),
  z.object({ type: z.literal('abort') }),
]);
export type PointerEvent = z.infer<typeof pointerEventSchema>;

export type CancelReason = 'degenerate' | 'aborted' | 'dismissed';

export type SelectionOutcome =
  | { status: 'selected'; path: Point[]; bounds: BoundingBox }
  | { status: 'cancelled'; reason: CancelReason };

// =============================================================================
// MASK & CANDIDATES
// =============================================================================

export interface MaskedImage extends DecodedImage {
  /** Top-left of the crop in frame coordinates */
  origin: Point;
  coverage: {
    insidePixels: number;
    fallback: 'none' | 'ellipse';
  };
}

export const strategyIdSchema = z.enum([
  'adaptive-threshold',
  'adaptive-threshold-inverted',
  'otsu-threshold',
  'otsu-threshold-inverted',
  'contrast',
]);
export type StrategyId = z.infer<typeof strategyIdSchema>;

/** Fixed generation order; also the consensus tie-break order */
export const STRATEGY_ORDER: readonly StrategyId[] = strategyIdSchema.options;

export interface CandidateImage {
  strategyId: StrategyId;
  width: number;
  height: number;
  /** Single gray channel, row-major */
  data: Buffer;
}

export interface CandidateFile {
  strategyId: StrategyId;
  path: string;
}

// =============================================================================
// OCR
// =============================================================================

export interface WordObservation {
  text: string;
  /** 0..100 */
  confidence: number;
}

export interface StrategyResult {
  strategyId: StrategyId;
  text: string;
  /** Mean confidence of the accepted words, 0 when none */
  confidence: number;
  wordCount: number;
}

export interface ConsensusResult {
  strategyId: StrategyId | null;
  text: string;
  confidence: number;
  wordCount: number;
}

export const EMPTY_CONSENSUS: ConsensusResult = Object.freeze({
  strategyId: null,
  text: '',
  confidence: 0,
  wordCount: 0,
});

// =============================================================================
// ROUTING
// =============================================================================

export const searchModeSchema = z.enum([
  'text-search',
  'translate',
  'visual-search',
  'homework-search',
]);
export type SearchMode = z.infer<typeof searchModeSchema>;
export type RoutingDecision = SearchMode;

// =============================================================================
// PORTS (Interfaces)
// =============================================================================

export type CommandResult =
  | { ok: true; stdout: string }
  | { ok: false; reason: 'missing' | 'exit' | 'timeout'; detail: string };

export interface CommandRunner {
  run(
    command: string,
    args: readonly string[],
    options: { timeoutMs: number }
  ): Promise<CommandResult>;
}

export interface ImageCodec {
  decodeFile(filePath: string): Promise<DecodedImage>;
  writeRgbaPng(image: DecodedImage, filePath: string): Promise<void>;
  writeGrayPng(candidate: CandidateImage, filePath: string): Promise<void>;
}

export interface OcrEngine {
  recognize(imagePath: string): Promise<WordObservation[]>;
  terminate(): Promise<void>;
}

export interface RegionSelector {
  select(profile: EnvironmentProfile): Promise<SelectionOutcome>;
}

export interface BrowserOpener {
  open(url: string): Promise<boolean>;
}

export interface VisualSearchService {
  upload(imagePath: string): Promise<boolean>;
}

// =============================================================================
// CONFIG
// =============================================================================

export const thresholdConfigSchema = z.object({
  /** Per-word floor: words at or below it are noise */
  noiseFloor: z.number().min(0).max(100).default(10),
  /** Aggregate floor for trusting the text */
  minConfidence: z.number().min(0).max(100).default(60),
  minTextLength: z.number().int().min(1).default(3),
  minAlphanumeric: z.number().int().min(0).default(3),
});
export type ThresholdConfig = z.infer<typeof thresholdConfigSchema>;

export const preprocessConfigSchema = z.object({
  strategies: z.array(strategyIdSchema).default([...STRATEGY_ORDER]),
  adaptiveBlockSize: z.number().int().min(3).default(11),
  adaptiveOffset: z.number().default(2),
  contrastFactor: z.number().positive().default(1.5),
  degenerateAreaRatio: z.number().min(0).max(1).default(0.01),
  concurrency: z.number().int().min(1).default(4),
});
export type PreprocessConfig = z.infer<typeof preprocessConfigSchema>;

export const ocrConfigSchema = z.object({
  languages: z.array(z.string().min(1)).min(1).default(['eng']),
  timeoutMs: z.number().int().positive().default(30000),
});
export type OcrConfig = z.infer<typeof ocrConfigSchema>;

export const browserConfigSchema = z.object({
  chromePath: z.string().optional(),
  lensUrl: z.string().url().default('https://www.google.com/?olud'),
  uploadTimeoutMs: z.number().int().positive().default(30000),
  translateTarget: z.string().min(2).default('en'),
});
export type BrowserConfig = z.infer<typeof browserConfigSchema>;

export const appConfigSchema = z.object({
  captureTimeoutMs: z.number().int().positive().default(10000),
  selectionTimeoutMs: z.number().int().positive().default(120000),
  tempRoot: z.string().optional(),
  verbose: z.boolean().default(false),
  thresholds: thresholdConfigSchema.default({}),
  preprocess: preprocessConfigSchema.default({}),
  ocr: ocrConfigSchema.default({}),
  browser: browserConfigSchema.default({}),
});
export type AppConfig = z.infer<typeof appConfigSchema>;

export const DEFAULT_APP_CONFIG: AppConfig = appConfigSchema.parse({});
