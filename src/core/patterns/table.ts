import { ConfigurationError } from '../errors.js';
import { countOccurrences } from '../text.js';
import type { KnownPatternIssue, PatternEntry } from '../types.js';

export class PatternTable {
  private readonly entries: ReadonlyMap<string, string>;

  /** Entries replaced by a later entry with the same corrupted key. */
  readonly shadowed: readonly PatternEntry[];

  constructor(entries: readonly PatternEntry[]) {
    const problems = entries
      .map((entry, index) => (entry.corrupted.length === 0 ? `pattern #${index + 1} has an empty corrupted sequence` : undefined))
      .filter((p): p is string => p !== undefined);
    if (problems.length > 0) {
      throw new ConfigurationError('Invalid pattern table', problems);
    }

    // Last write wins; the key keeps its first position.
    const map = new Map<string, string>();
    const shadowed: PatternEntry[] = [];
    for (const { corrupted, correct } of entries) {
      const previous = map.get(corrupted);
      if (previous !== undefined) {
        shadowed.push({ corrupted, correct: previous });
      }
      map.set(corrupted, correct);
    }

    this.entries = map;
    this.shadowed = Object.freeze(shadowed);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  toEntries(): PatternEntry[] {
    return [...this.entries].map(([corrupted, correct]) => ({ corrupted, correct }));
  }

  scan(text: string): KnownPatternIssue[] {
    const found: KnownPatternIssue[] = [];

    for (const [pattern, expected] of this.entries) {
      const count = countOccurrences(text, pattern);
      if (count > 0) {
        found.push({
          type: 'known_pattern',
          pattern,
          expected,
          count,
          description: `"${pattern}" should be "${expected}"`,
        });
      }
    }

    return found;
  }
}
