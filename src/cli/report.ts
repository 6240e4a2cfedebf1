import chalk from 'chalk';
import type { DetectionResult, Issue } from '../core/types.js';

const RULE = '='.repeat(60);
const DIVIDER = '-'.repeat(40);

export interface ScanReport {
  path: string;
  lossy: boolean;
  result: DetectionResult;
}

export function renderReport(result: DetectionResult, label?: string): string {
  const lines: string[] = [RULE, chalk.bold('MOJIBAKE DETECTION REPORT'), RULE];

  if (label) lines.push(`Source: ${label}`);
  lines.push('');

  if (result.hasMojibake) {
    lines.push(chalk.red.bold('⚠ Mojibake detected'));
  } else {
    lines.push(chalk.green('✓ No mojibake detected'));
  }
  lines.push(`Confidence: ${result.confidence.toFixed(1)}%`);

  if (result.issues.length > 0) {
    lines.push('', chalk.bold(`Found ${result.issues.length} issue type(s):`), DIVIDER);
    for (const issue of result.issues) {
      lines.push(...renderIssue(issue));
    }
  }

  const stats = result.statistics;
  lines.push(
    '',
    chalk.bold('Statistics:'),
    DIVIDER,
    `• Total characters: ${stats.totalChars}`,
    `• Non-ASCII ratio: ${(stats.nonAsciiRatio * 100).toFixed(2)}%`,
    `• Suspicious sequences: ${stats.suspiciousSequences}`,
    `• Marker characters: ${stats.weirdCharCount}`,
  );

  if (result.samples.length > 0) {
    lines.push('', chalk.bold('Sample problematic lines:'), DIVIDER);
    result.samples.forEach((sample, i) => lines.push(`${i + 1}. ${sample}`));
  }

  lines.push('', RULE);
  return lines.join('\n');
}

function renderIssue(issue: Issue): string[] {
  switch (issue.type) {
    case 'known_pattern':
      return [`• ${issue.description}`, `  Found ${issue.count} occurrence(s)`];
    case 'regex_match': {
      const lines = [`• ${issue.description}`, `  Found ${issue.count} match(es)`];
      if (issue.samples.length > 0) {
        lines.push(`  Samples: ${issue.samples.slice(0, 3).map(s => JSON.stringify(s)).join(', ')}`);
      }
      return lines;
    }
  }
}

export function renderJson(reports: ScanReport[]): string {
  return JSON.stringify(reports, null, 2);
}

export const EXIT_CLEAN = 0;
export const EXIT_MOJIBAKE = 1;
export const EXIT_ERROR = 2;

export function exitCodeFor(results: DetectionResult[]): number {
  return results.some(r => r.hasMojibake) ? EXIT_MOJIBAKE : EXIT_CLEAN;
}
