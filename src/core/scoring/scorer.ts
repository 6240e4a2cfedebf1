import { truncate } from '../text.js';
import type { KnownPatternIssue, RegexMatchIssue, ScoreResult, Statistics } from '../types.js';

const PATTERN_WEIGHT = 10;
const PATTERN_CAP = 40;
const REGEX_WEIGHT = 8;
const REGEX_CAP = 30;
const MAX_CONFIDENCE = 100;

const SUSPICIOUS_THRESHOLD = 5;
const SUSPICIOUS_BONUS = 20;
const WEIRD_CHAR_THRESHOLD = 10;
const WEIRD_CHAR_BONUS = 15;
const UNUSUAL_RATIO_THRESHOLD = 0.01;
const UNUSUAL_RATIO_BONUS = 10;
const NON_ASCII_BAND_MIN = 0.1;
const NON_ASCII_BAND_MAX = 0.5;
const NON_ASCII_BAND_BONUS = 5;

const SAMPLE_WINDOW_LINES = 100;
const SAMPLE_MAX_LENGTH = 100;
export const MAX_SAMPLES = 5;

/**
 * Merge the three evidence sources into a 0-100 confidence score.
 *
 * `hasMojibake` only reflects dictionary and regex evidence: statistics
 * can raise the score but never set the flag on their own.
 */
export function combine(
  patternIssues: readonly KnownPatternIssue[],
  regexIssues: readonly RegexMatchIssue[],
  stats: Statistics,
): ScoreResult {
  let confidence = 0;

  if (patternIssues.length > 0) {
    confidence += Math.min(patternIssues.length * PATTERN_WEIGHT, PATTERN_CAP);
  }
  if (regexIssues.length > 0) {
    confidence += Math.min(regexIssues.length * REGEX_WEIGHT, REGEX_CAP);
  }

  if (stats.suspiciousSequences > SUSPICIOUS_THRESHOLD) confidence += SUSPICIOUS_BONUS;
  if (stats.weirdCharCount > WEIRD_CHAR_THRESHOLD) confidence += WEIRD_CHAR_BONUS;
  if (stats.unusualCharRatio > UNUSUAL_RATIO_THRESHOLD) confidence += UNUSUAL_RATIO_BONUS;

  // Mostly-ASCII or mostly non-Latin text is presumed natural
  if (stats.nonAsciiRatio > NON_ASCII_BAND_MIN && stats.nonAsciiRatio < NON_ASCII_BAND_MAX) {
    confidence += NON_ASCII_BAND_BONUS;
  }

  return {
    confidence: Math.min(confidence, MAX_CONFIDENCE),
    hasMojibake: patternIssues.length > 0 || regexIssues.length > 0,
  };
}

/** Lines from the head of the text that contain a known corrupted sequence. */
export function extractSamples(text: string, keys: readonly string[], limit = MAX_SAMPLES): string[] {
  const samples: string[] = [];

  for (const line of text.split('\n').slice(0, SAMPLE_WINDOW_LINES)) {
    if (samples.length >= limit) break;
    if (keys.some(key => line.includes(key))) {
      samples.push(truncate(line, SAMPLE_MAX_LENGTH));
    }
  }

  return samples;
}
