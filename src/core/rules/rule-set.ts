import { ConfigurationError } from '../errors.js';
import type { RegexMatchIssue, RegexRule, RegexRuleSpec } from '../types.js';

const MAX_RAW_SAMPLES = 10;
const MAX_SAMPLES = 5;

export class RegexRuleSet {
  readonly rules: readonly RegexRule[];

  constructor(specs: readonly RegexRuleSpec[]) {
    const rules: RegexRule[] = [];
    const problems: string[] = [];

    specs.forEach((spec, index) => {
      try {
        rules.push({ pattern: compileRule(spec), description: spec.description });
      } catch (err) {
        if (!(err instanceof SyntaxError)) throw err;
        problems.push(`rule #${index + 1} (${spec.description}): ${err.message}`);
      }
    });

    if (problems.length > 0) {
      throw new ConfigurationError('Invalid regex rules', problems);
    }

    this.rules = Object.freeze(rules);
  }

  get size(): number {
    return this.rules.length;
  }

  scan(text: string): RegexMatchIssue[] {
    const found: RegexMatchIssue[] = [];

    for (const { pattern, description } of this.rules) {
      // matchAll clones the regex, so lastIndex on the shared rule is never touched
      const matches = Array.from(text.matchAll(pattern), m => m[0]);
      if (matches.length === 0) continue;

      const unique = [...new Set(matches.slice(0, MAX_RAW_SAMPLES))];
      found.push({
        type: 'regex_match',
        pattern: pattern.source,
        description,
        count: matches.length,
        samples: unique.slice(0, MAX_SAMPLES),
      });
    }

    return found;
  }
}

function compileRule(spec: RegexRuleSpec): RegExp {
  const flags = new Set(`gm${spec.flags ?? ''}`);
  return new RegExp(spec.pattern, [...flags].join(''));
}
