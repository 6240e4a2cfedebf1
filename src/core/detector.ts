import { defaultTables } from './data/index.js';
import { PatternTable } from './patterns/table.js';
import { RegexRuleSet } from './rules/rule-set.js';
import { StatisticalProfiler } from './stats/profiler.js';
import { combine, extractSamples } from './scoring/scorer.js';
import type { DetectionResult, DetectorTables, MojiscanConfig } from './types.js';

export class MojibakeDetector {
  readonly patterns: PatternTable;
  readonly rules: RegexRuleSet;
  readonly profiler: StatisticalProfiler;

  /** Throws ConfigurationError when any table is unusable. */
  constructor(tables: DetectorTables = defaultTables()) {
    this.patterns = new PatternTable(tables.patterns);
    this.rules = new RegexRuleSet(tables.rules);
    this.profiler = new StatisticalProfiler(tables.profile);
  }

  detect(text: string): DetectionResult {
    const patternIssues = this.patterns.scan(text);
    const regexIssues = this.rules.scan(text);
    const statistics = this.profiler.analyze(text);
    const { confidence, hasMojibake } = combine(patternIssues, regexIssues, statistics);

    return {
      hasMojibake,
      confidence,
      issues: [...patternIssues, ...regexIssues],
      statistics,
      samples: extractSamples(text, this.patterns.keys()),
    };
  }
}

export function createDetector(config: MojiscanConfig): MojibakeDetector {
  return new MojibakeDetector(config.tables);
}

let sharedDetector: MojibakeDetector | undefined;

/** Run the bundled tables over `text`. */
export function detect(text: string): DetectionResult {
  sharedDetector ??= new MojibakeDetector();
  return sharedDetector.detect(text);
}
