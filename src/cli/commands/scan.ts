import { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { createDetector } from '../../core/detector.js';
import { errorMessage } from '../../core/errors.js';
import { readTextFile } from '../../core/source.js';
import { EXIT_ERROR, exitCodeFor, renderJson, renderReport } from '../report.js';
import type { ScanReport } from '../report.js';

interface ScanOptions {
  json: boolean;
  config?: string;
  project: string;
}

export function scanCommand(): Command {
  return new Command('scan')
    .description('Check files for mojibake (use - for stdin)')
    .argument('<files...>', 'Files to check')
    .option('--json', 'Print results as JSON', false)
    .option('-c, --config <path>', 'Config file with extra patterns and rules')
    .option('-p, --project <path>', 'Project root path', process.cwd())
    .action((files: string[], options: ScanOptions) => {
      try {
        const config = resolveConfig({ projectRoot: options.project, configPath: options.config });
        const detector = createDetector(config);

        const reports: ScanReport[] = files.map(path => {
          const { text, lossy } = readTextFile(path);
          return { path, lossy, result: detector.detect(text) };
        });

        if (options.json) {
          console.log(renderJson(reports));
        } else {
          for (const report of reports) {
            if (report.lossy) {
              console.log(chalk.yellow(`⚠ ${report.path} is not valid UTF-8; undecodable bytes were replaced`));
            }
            console.log(renderReport(report.result, report.path));
          }
        }

        process.exitCode = exitCodeFor(reports.map(r => r.result));
      } catch (err) {
        console.error(chalk.red('Error:'), errorMessage(err));
        process.exitCode = EXIT_ERROR;
      }
    });
}
