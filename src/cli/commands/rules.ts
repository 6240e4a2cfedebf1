import { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { createDetector } from '../../core/detector.js';
import { errorMessage } from '../../core/errors.js';
import { EXIT_ERROR } from '../report.js';

export function rulesCommand(): Command {
  return new Command('rules')
    .description('List the loaded pattern table and regex rules')
    .option('-c, --config <path>', 'Config file with extra patterns and rules')
    .option('-p, --project <path>', 'Project root path', process.cwd())
    .action((options: { config?: string; project: string }) => {
      try {
        const config = resolveConfig({ projectRoot: options.project, configPath: options.config });
        const detector = createDetector(config);

        console.log(chalk.bold(`Config: ${config.configPath ?? 'bundled tables only'}\n`));

        console.log(chalk.bold(`📖 Known patterns (${detector.patterns.size}):`));
        for (const { corrupted, correct } of detector.patterns.toEntries()) {
          console.log(`  ${JSON.stringify(corrupted)} → ${JSON.stringify(correct)}`);
        }

        for (const entry of detector.patterns.shadowed) {
          console.log(chalk.yellow(`  ⚠ ${JSON.stringify(entry.corrupted)} → ${JSON.stringify(entry.correct)} is shadowed by a later entry with the same key`));
        }
        console.log('');

        console.log(chalk.bold(`🔎 Regex rules (${detector.rules.size}):`));
        for (const rule of detector.rules.rules) {
          console.log(`  ${chalk.cyan(rule.pattern.toString())}  ${rule.description}`);
        }
        console.log('');

        const { suspiciousCombos, weirdChars } = config.tables.profile;
        console.log(chalk.bold('📊 Profile:'));
        console.log(`  Suspicious combinations: ${suspiciousCombos.length}`);
        console.log(`  Marker characters: ${weirdChars.join(' ')}`);
      } catch (err) {
        console.error(chalk.red('Error:'), errorMessage(err));
        process.exitCode = EXIT_ERROR;
      }
    });
}
