/**
 * Lasso Session
 *
 * One capture → select → mask → preprocess → OCR → route → hand-off run.
 * All intermediate files live in a per-session temp directory that is
 * removed when the session ends, successful or not.
 *
 * Stage outcomes:
 *   capture exhausted      → CaptureFailedError (fatal)
 *   selection degenerate   → { status: 'cancelled' }
 *   abort signal           → { status: 'cancelled' } at the next stage
 *   candidate/OCR failure  → dropped / scored empty, session continues
 *   no usable text         → visual search
 */

import path from 'node:path';
import type {
  AppConfig,
  BrowserOpener,
  CancelReason,
  CandidateFile,
  CandidateImage,
  CommandRunner,
  ConsensusResult,
  EnvironmentProfile,
  ImageCodec,
  MaskedImage,
  OcrEngine,
  Point,
  PointerEvent,
  RawImage,
  RegionSelector,
  RoutingDecision,
  SearchMode,
  SelectionOutcome,
  StrategyResult,
  VisualSearchService,
} from '../0_types.js';
import { EMPTY_CONSENSUS } from '../0_types.js';
import { boundingBoxOf, isDegeneratePath, recordSelection } from '../domain/region.js';
import { CaptureFailedError, errorMessage, SessionCancelledError } from '../errors.js';
import { log, step, withSession } from '../pipeline/context.js';
import { captureScreen } from '../services/capture-chain.js';
import { maskAndCrop } from '../services/mask-crop.js';
import { extractConsensus } from '../services/ocr-consensus.js';
import { generateCandidates } from '../services/preprocessing.js';
import { buildSearchUrl, routeResult } from '../services/routing.js';
import { fulfilledValues, settledMap } from '../utils/parallel.js';
import { withTempDir } from '../utils/temp.js';

export interface SessionServices {
  runner: CommandRunner;
  codec: ImageCodec;
  ocr: OcrEngine;
  selector: RegionSelector;
  opener: BrowserOpener;
  visualSearch: VisualSearchService;
}

export type SelectionSource =
  | { kind: 'path'; path: Point[] }
  | { kind: 'events'; events: PointerEvent[] }
  | { kind: 'interactive' };

export interface SessionRequest {
  mode: SearchMode;
  selection: SelectionSource;
  profile: EnvironmentProfile;
  /** Use an existing screenshot instead of the capture chain */
  imagePath?: string;
  signal?: AbortSignal;
  quiet?: boolean;
}

export type SessionResult =
  | {
      status: 'completed';
      decision: RoutingDecision;
      consensus: ConsensusResult;
      results: StrategyResult[];
      provenance: string;
      url: string | null;
      handedOff: boolean;
    }
  | { status: 'cancelled'; reason: CancelReason };

async function acquireImage(
  request: SessionRequest,
  services: SessionServices,
  config: AppConfig,
  dir: string
): Promise<RawImage> {
  if (request.imagePath) {
    const decoded = await services.codec.decodeFile(request.imagePath);
    return { ...decoded, sourcePath: request.imagePath, provenance: 'file' };
  }

  const outcome = await captureScreen(request.profile, {
    runner: services.runner,
    codec: services.codec,
    outputDir: dir,
    timeoutMs: config.captureTimeoutMs,
  });
  if (!outcome.ok) throw new CaptureFailedError(outcome.attempts);
  return outcome.image;
}

async function resolveSelection(
  source: SelectionSource,
  services: SessionServices,
  profile: EnvironmentProfile
): Promise<SelectionOutcome> {
  switch (source.kind) {
    case 'path':
      return isDegeneratePath(source.path)
        ? { status: 'cancelled', reason: 'degenerate' }
        : { status: 'selected', path: source.path, bounds: boundingBoxOf(source.path) };
    case 'events':
      return recordSelection(source.events);
    case 'interactive':
      return services.selector.select(profile);
  }
}

async function writeCandidates(
  candidates: CandidateImage[],
  codec: ImageCodec,
  dir: string,
  concurrency: number
): Promise<CandidateFile[]> {
  const settled = await settledMap(
    candidates,
    async (candidate) => {
      const filePath = path.join(dir, `candidate-${candidate.strategyId}.png`);
      await codec.writeGrayPng(candidate, filePath);
      return { strategyId: candidate.strategyId, path: filePath };
    },
    concurrency
  );

  for (const result of settled) {
    if (result.status === 'rejected') {
      log('warn', `Dropping ${result.item.strategyId}: ${errorMessage(result.reason)}`);
    }
  }
  return fulfilledValues(settled);
}

async function handOff(
  decision: RoutingDecision,
  consensus: ConsensusResult,
  maskedPath: string,
  services: SessionServices,
  config: AppConfig
): Promise<{ url: string | null; handedOff: boolean }> {
  if (decision === 'visual-search') {
    log('info', 'No readable text found - using visual search.');
    return { url: null, handedOff: await services.visualSearch.upload(maskedPath) };
  }

  log('info', `Found text: ${consensus.text}`);
  const url = buildSearchUrl(decision, consensus.text, config.browser);
  return { url, handedOff: await services.opener.open(url) };
}

export async function runSession(
  request: SessionRequest,
  services: SessionServices,
  config: AppConfig
): Promise<SessionResult> {
  return withSession(
    { verbose: config.verbose, quiet: request.quiet, signal: request.signal },
    () =>
      withTempDir(async (dir): Promise<SessionResult> => {
        try {
          const raw = await step('Capture screen', () =>
            acquireImage(request, services, config, dir)
          );

          const selection = await step('Define region', () =>
            resolveSelection(request.selection, services, request.profile)
          );
          if (selection.status === 'cancelled') {
            log('info', 'No region selected.');
            return { status: 'cancelled', reason: selection.reason };
          }

          const maskedPath = path.join(dir, 'selection.png');
          const masked: MaskedImage = await step('Mask & crop', async () => {
            const image = maskAndCrop(raw, selection.path, {
              degenerateAreaRatio: config.preprocess.degenerateAreaRatio,
            });
            await services.codec.writeRgbaPng(image, maskedPath);
            return image;
          });
          log(
            'debug',
            `Region ${masked.width}x${masked.height} at ${masked.origin.x},${masked.origin.y}, ${masked.coverage.insidePixels} px covered (${masked.coverage.fallback})`
          );

          let consensus: ConsensusResult = { ...EMPTY_CONSENSUS };
          let results: StrategyResult[] = [];

          if (request.mode !== 'visual-search') {
            const files = await step('Preprocess candidates', () =>
              writeCandidates(
                generateCandidates(masked, config.preprocess),
                services.codec,
                dir,
                config.preprocess.concurrency
              )
            );
            const report = await step('OCR consensus', () =>
              extractConsensus(files, services.ocr, {
                noiseFloor: config.thresholds.noiseFloor,
              })
            );
            consensus = report.consensus;
            results = report.results;
          }

          const decision = routeResult(consensus, request.mode, config.thresholds);
          log(
            'debug',
            `Route: ${decision} (requested ${request.mode}, confidence ${consensus.confidence.toFixed(1)})`
          );

          const { url, handedOff } = await step('Hand off', () =>
            handOff(decision, consensus, maskedPath, services, config)
          );

          return {
            status: 'completed',
            decision,
            consensus,
            results,
            provenance: raw.provenance,
            url,
            handedOff,
          };
        } catch (error) {
          if (error instanceof SessionCancelledError) {
            return { status: 'cancelled', reason: 'aborted' };
          }
          throw error;
        }
      }, config.tempRoot)
  );
}
