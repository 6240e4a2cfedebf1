export interface PatternEntry {
  corrupted: string;
  correct: string;
}

export interface RegexRuleSpec {
  pattern: string;
  description: string;
  flags?: string;
}

export interface RegexRule {
  pattern: RegExp;
  description: string;
}

export interface ProfileSpec {
  suspiciousCombos: string[];
  weirdChars: string[];
}

export interface DetectorTables {
  patterns: PatternEntry[];
  rules: RegexRuleSpec[];
  profile: ProfileSpec;
}

export interface KnownPatternIssue {
  type: 'known_pattern';
  pattern: string;
  expected: string;
  count: number;
  description: string;
}

export interface RegexMatchIssue {
  type: 'regex_match';
  pattern: string;
  description: string;
  count: number;
  samples: string[];
}

export type Issue = KnownPatternIssue | RegexMatchIssue;

export interface Statistics {
  totalChars: number;
  highBytes: number;
  controlChars: number;
  suspiciousSequences: number;
  nonAsciiRatio: number;
  unusualCharRatio: number;
  weirdCharCount: number;
}

export interface DetectionResult {
  hasMojibake: boolean;
  confidence: number;
  issues: Issue[];
  statistics: Statistics;
  samples: string[];
}

export interface ScoreResult {
  confidence: number;
  hasMojibake: boolean;
}

export interface SourceText {
  text: string;
  lossy: boolean;
}

export interface MojiscanConfig {
  projectRoot: string;
  configPath?: string;
  tables: DetectorTables;
}

export const EMPTY_STATISTICS: Readonly<Statistics> = Object.freeze({
  totalChars: 0,
  highBytes: 0,
  controlChars: 0,
  suspiciousSequences: 0,
  nonAsciiRatio: 0,
  unusualCharRatio: 0,
  weirdCharCount: 0,
});
