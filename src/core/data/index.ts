import patterns from './patterns.json' with { type: 'json' };
import rules from './regex-rules.json' with { type: 'json' };
import profile from './profile.json' with { type: 'json' };
import type { DetectorTables, PatternEntry, ProfileSpec, RegexRuleSpec } from '../types.js';

// UTF-8 read as Windows-1252 / Latin-1
export const DEFAULT_PATTERNS: readonly PatternEntry[] = Object.freeze(patterns);
export const DEFAULT_RULES: readonly RegexRuleSpec[] = Object.freeze(rules);
export const DEFAULT_PROFILE: Readonly<ProfileSpec> = Object.freeze(profile);

export function defaultTables(): DetectorTables {
  return {
    patterns: [...DEFAULT_PATTERNS],
    rules: [...DEFAULT_RULES],
    profile: {
      suspiciousCombos: [...DEFAULT_PROFILE.suspiciousCombos],
      weirdChars: [...DEFAULT_PROFILE.weirdChars],
    },
  };
}
