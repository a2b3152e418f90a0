import { describe, expect, it } from 'vitest';
import { type ConsensusResult, DEFAULT_APP_CONFIG } from '../../0_types.js';
import {
  buildSearchUrl,
  countAlphanumeric,
  isDegenerateText,
  normalizeText,
  rejectionReason,
  routeResult,
} from '../../services/routing.js';

const thresholds = DEFAULT_APP_CONFIG.thresholds;

function consensus(text: string, confidence: number): ConsensusResult {
  return {
    strategyId: 'adaptive-threshold',
    text,
    confidence,
    wordCount: text.split(' ').filter(Boolean).length,
  };
}

describe('text checks', () => {
  it('normalizeText collapses whitespace', () => {
    expect(normalizeText('  a\n\tb  ')).toBe('a b');
  });

  it('countAlphanumeric counts letters and digits in any script', () => {
    expect(countAlphanumeric('héllo 42!')).toBe(7);
  });

  it('isDegenerateText flags numeric noise and lone characters', () => {
    expect(isDegenerateText('12 / 34')).toBe(true);
    expect(isDegenerateText('a b c d')).toBe(true);
    expect(isDegenerateText('Total 42')).toBe(false);
  });
});

describe('rejectionReason', () => {
  it.each([
    ['', 90, 'empty'],
    ['ab', 90, 'too-short'],
    ['!!!???', 90, 'few-alphanumerics'],
    ['Hello world', 59.9, 'low-confidence'],
    ['12 / 34', 90, 'degenerate'],
  ] as const)('rejects %j at confidence %d as %s', (text, confidence, reason) => {
    expect(rejectionReason(consensus(text, confidence), thresholds)).toBe(reason);
  });

  it('accepts text exactly at the confidence threshold', () => {
    expect(rejectionReason(consensus('Hello world', 60), thresholds)).toBeNull();
  });
});

describe('routeResult', () => {
  it('keeps the requested text mode when the text is usable', () => {
    expect(routeResult(consensus('Hello world', 85), 'text-search', thresholds)).toBe(
      'text-search'
    );
    expect(routeResult(consensus('Guten Tag', 85), 'translate', thresholds)).toBe(
      'translate'
    );
  });

  it('falls back to visual search for unusable text', () => {
    expect(routeResult(consensus('Hello world', 20), 'homework-search', thresholds)).toBe(
      'visual-search'
    );
  });

  it('honours an explicit visual search', () => {
    expect(routeResult(consensus('Hello world', 99), 'visual-search', thresholds)).toBe(
      'visual-search'
    );
  });

  it('uses configured thresholds', () => {
    const lenient = { ...thresholds, minConfidence: 10 };
    expect(routeResult(consensus('Hello world', 20), 'text-search', lenient)).toBe(
      'text-search'
    );
  });
});

describe('buildSearchUrl', () => {
  const options = { translateTarget: 'de' };

  it('encodes the text for a web search', () => {
    expect(buildSearchUrl('text-search', '  C++ & you ', options)).toBe(
      'https://www.google.com/search?q=C%2B%2B+%26+you'
    );
  });

  it('prefixes homework searches with "solve"', () => {
    expect(buildSearchUrl('homework-search', 'x + 2 = 5', options)).toBe(
      'https://www.google.com/search?q=solve+x+%2B+2+%3D+5'
    );
  });

  it('builds a translator URL for the target language', () => {
    expect(buildSearchUrl('translate', 'Guten\nTag', options)).toBe(
      'https://translate.google.com/?sl=auto&tl=de&text=Guten+Tag&op=translate'
    );
  });
});
