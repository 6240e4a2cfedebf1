import { ConfigurationError } from '../errors.js';
import { countOccurrences } from '../text.js';
import { EMPTY_STATISTICS } from '../types.js';
import type { ProfileSpec, Statistics } from '../types.js';

const TAB = 9;
const LF = 10;
const CR = 13;

export class StatisticalProfiler {
  private readonly suspiciousCombos: readonly string[];
  private readonly weirdChars: readonly string[];

  constructor(profile: Readonly<ProfileSpec>) {
    const problems = [
      ...emptyEntries(profile.suspiciousCombos, 'suspicious combination'),
      ...emptyEntries(profile.weirdChars, 'marker character'),
    ];
    if (problems.length > 0) {
      throw new ConfigurationError('Invalid statistical profile', problems);
    }

    this.suspiciousCombos = Object.freeze([...profile.suspiciousCombos]);
    this.weirdChars = Object.freeze([...profile.weirdChars]);
  }

  analyze(text: string): Statistics {
    if (text.length === 0) return { ...EMPTY_STATISTICS };

    let totalChars = 0;
    let highBytes = 0;
    let controlChars = 0;

    for (const char of text) {
      const code = char.codePointAt(0) ?? 0;
      totalChars++;
      if (code > 127) highBytes++;
      if (code < 32 && code !== TAB && code !== LF && code !== CR) controlChars++;
    }

    const suspiciousSequences = sumOccurrences(text, this.suspiciousCombos);
    const weirdCharCount = sumOccurrences(text, this.weirdChars);

    return {
      totalChars,
      highBytes,
      controlChars,
      suspiciousSequences,
      nonAsciiRatio: highBytes / totalChars,
      unusualCharRatio: (controlChars + suspiciousSequences) / totalChars,
      weirdCharCount,
    };
  }
}

function sumOccurrences(text: string, needles: readonly string[]): number {
  return needles.reduce((sum, needle) => sum + countOccurrences(text, needle), 0);
}

function emptyEntries(values: readonly string[], label: string): string[] {
  return values.flatMap((value, index) => (value.length === 0 ? [`${label} #${index + 1} is empty`] : []));
}
