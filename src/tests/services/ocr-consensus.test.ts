import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type {
  CandidateFile,
  OcrEngine,
  StrategyResult,
  WordObservation,
} from '../../0_types.js';
import {
  extractConsensus,
  pickBest,
  scoreObservations,
} from '../../services/ocr-consensus.js';

describe('scoreObservations', () => {
  it('keeps words above the noise floor and averages their confidence', () => {
    const result = scoreObservations(
      'contrast',
      [
        { text: ' Hello ', confidence: 90 },
        { text: 'world', confidence: 80 },
        { text: '~', confidence: 5 },
        { text: '', confidence: 99 },
      ],
      10
    );
    expect(result).toEqual({
      strategyId: 'contrast',
      text: 'Hello world',
      confidence: 85,
      wordCount: 2,
    });
  });

  it('drops words exactly at the floor', () => {
    const result = scoreObservations('otsu-threshold', [{ text: 'edge', confidence: 10 }], 10);
    expect(result).toEqual({
      strategyId: 'otsu-threshold',
      text: '',
      confidence: 0,
      wordCount: 0,
    });
  });
});

describe('pickBest', () => {
  const result = (
    strategyId: StrategyResult['strategyId'],
    confidence: number,
    wordCount: number
  ): StrategyResult => ({ strategyId, text: `${strategyId} text`, confidence, wordCount });

  it('keeps the earlier strategy on a tie and skips empty results', () => {
    const best = pickBest([
      result('adaptive-threshold', 70, 2),
      result('adaptive-threshold-inverted', 70, 3),
      result('otsu-threshold', 95, 0),
    ]);
    expect(best.strategyId).toBe('adaptive-threshold');
    expect(best.confidence).toBe(70);
  });

  it('picks the highest confidence', () => {
    const best = pickBest([
      result('adaptive-threshold', 40, 1),
      result('contrast', 88.5, 4),
    ]);
    expect(best).toEqual({
      strategyId: 'contrast',
      text: 'contrast text',
      confidence: 88.5,
      wordCount: 4,
    });
  });

  it('returns an empty result when no candidate recognised anything', () => {
    const best = pickBest([result('adaptive-threshold', 0, 0)]);
    expect(best).toEqual({ strategyId: null, text: '', confidence: 0, wordCount: 0 });
    expect(Object.isFrozen(best)).toBe(false);
  });
});

describe('extractConsensus', () => {
  let dir: string;
  let files: CandidateFile[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'consensus-test-'));
    files = [
      { strategyId: 'adaptive-threshold', path: path.join(dir, 'a.png') },
      { strategyId: 'adaptive-threshold-inverted', path: path.join(dir, 'b.png') },
      { strategyId: 'contrast', path: path.join(dir, 'c.png') },
    ];
    for (const file of files) await writeFile(file.path, 'placeholder');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function engineFor(byPath: Record<string, WordObservation[] | Error>): OcrEngine {
    return {
      recognize: vi.fn(async (imagePath: string) => {
        const entry = byPath[imagePath];
        if (entry instanceof Error) throw entry;
        return entry ?? [];
      }),
      terminate: vi.fn(async () => {}),
    };
  }

  it('selects the most confident candidate and scores every one', async () => {
    const engine = engineFor({
      [files[0].path]: [{ text: 'Quarterly', confidence: 62 }],
      [files[1].path]: [
        { text: 'Quarterly', confidence: 91 },
        { text: 'report', confidence: 87 },
      ],
      [files[2].path]: [{ text: 'Ouarterly', confidence: 55 }],
    });

    const report = await extractConsensus(files, engine, { noiseFloor: 10 });

    expect(report.consensus).toEqual({
      strategyId: 'adaptive-threshold-inverted',
      text: 'Quarterly report',
      confidence: 89,
      wordCount: 2,
    });
    expect(report.results.map((r) => r.strategyId)).toEqual([
      'adaptive-threshold',
      'adaptive-threshold-inverted',
      'contrast',
    ]);
    expect(engine.recognize).toHaveBeenCalledTimes(3);
  });

  it('scores a failing candidate as empty and continues', async () => {
    const engine = engineFor({
      [files[0].path]: new Error('engine crashed'),
      [files[2].path]: [{ text: 'Invoice', confidence: 77 }],
    });

    const report = await extractConsensus(files, engine, { noiseFloor: 10 });

    expect(report.results[0].wordCount).toBe(0);
    expect(report.consensus.strategyId).toBe('contrast');
    expect(report.consensus.text).toBe('Invoice');
  });

  it('removes every candidate file afterwards', async () => {
    await extractConsensus(files, engineFor({}), { noiseFloor: 10 });
    for (const file of files) {
      expect(existsSync(file.path)).toBe(false);
    }
  });
});
