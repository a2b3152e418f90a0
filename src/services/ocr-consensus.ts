/**
 * OCR Consensus Extractor
 *
 * Runs the OCR engine over every candidate and keeps the one the engine is
 * most confident about. Two floors apply to recognised text: the per-word
 * noise floor here, and the aggregate acceptance floor in routing.
 */

import { rm } from 'node:fs/promises';
import {
  type CandidateFile,
  type ConsensusResult,
  EMPTY_CONSENSUS,
  type OcrEngine,
  type StrategyId,
  type StrategyResult,
  type WordObservation,
} from '../0_types.js';
import { errorMessage } from '../errors.js';
import { log } from '../pipeline/context.js';

export interface ConsensusOptions {
  /** Words with confidence at or below this are dropped */
  noiseFloor: number;
}

/** Accepted words joined in source order, with their mean confidence */
export function scoreObservations(
  strategyId: StrategyId,
  words: readonly WordObservation[],
  noiseFloor: number
): StrategyResult {
  const accepted = words
    .map((w) => ({ text: w.text.trim(), confidence: w.confidence }))
    .filter((w) => w.text.length > 0 && w.confidence > noiseFloor);

  const sum = accepted.reduce((acc, w) => acc + w.confidence, 0);
  return {
    strategyId,
    text: accepted.map((w) => w.text).join(' '),
    confidence: accepted.length > 0 ? sum / accepted.length : 0,
    wordCount: accepted.length,
  };
}

/** Highest mean confidence wins; on a tie the earlier strategy stays. */
export function pickBest(results: readonly StrategyResult[]): ConsensusResult {
  let best: StrategyResult | null = null;
  for (const result of results) {
    if (result.wordCount === 0) continue;
    if (!best || result.confidence > best.confidence) best = result;
  }
  return best ? { ...best } : { ...EMPTY_CONSENSUS };
}

export interface ConsensusReport {
  consensus: ConsensusResult;
  results: StrategyResult[];
}

/**
 * Candidates must be in generation order. Every candidate file is removed
 * afterwards, whatever happened.
 */
export async function extractConsensus(
  candidates: readonly CandidateFile[],
  engine: OcrEngine,
  options: ConsensusOptions
): Promise<ConsensusReport> {
  try {
    const results: StrategyResult[] = [];

    for (const candidate of candidates) {
      let words: WordObservation[] = [];
      try {
        words = await engine.recognize(candidate.path);
      } catch (error) {
        log(
          'warn',
          `OCR failed for ${candidate.strategyId}: ${errorMessage(error)}`
        );
      }

      const result = scoreObservations(
        candidate.strategyId,
        words,
        options.noiseFloor
      );
      log(
        'debug',
        `${candidate.strategyId}: ${result.wordCount} words, confidence ${result.confidence.toFixed(1)}`
      );
      results.push(result);
    }

    return { consensus: pickBest(results), results };
  } finally {
    await Promise.all(candidates.map((c) => rm(c.path, { force: true })));
  }
}
