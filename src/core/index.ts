// Core types
export * from './types.js';

// Detection pipeline
export { MojibakeDetector, createDetector, detect } from './detector.js';
export { PatternTable } from './patterns/table.js';
export { RegexRuleSet } from './rules/rule-set.js';
export { StatisticalProfiler } from './stats/profiler.js';
export { combine, extractSamples, MAX_SAMPLES } from './scoring/scorer.js';

// Bundled tables
export { DEFAULT_PATTERNS, DEFAULT_RULES, DEFAULT_PROFILE, defaultTables } from './data/index.js';

// Input
export { decodeText, readTextFile } from './source.js';

// Config
export { resolveConfig, loadConfigFile, parseConfigFile, mergeTables, CONFIG_FILE, CONFIG_ENV } from './config.js';
export type { ConfigFile, ResolveOptions } from './config.js';

// Errors
export { ConfigurationError, errorMessage } from './errors.js';
