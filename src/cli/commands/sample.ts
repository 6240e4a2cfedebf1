import { Command } from 'commander';
import { detect } from '../../core/detector.js';
import { exitCodeFor, renderJson, renderReport } from '../report.js';

export const SAMPLE_TEXT = [
  'This text has mojibake: itâ€™s not displayed correctly.',
  'The companyâ€™s report shows â‚¬100 in revenue.',
  'Special chars: Ã© Ã¡ Ã± â€œquotesâ€ and â€" dashes.',
  'Normal text is fine, but Ã¢â‚¬â„¢ this isn\'t.',
].join('\n');

export function sampleCommand(): Command {
  return new Command('sample')
    .description('Run the detector over a built-in corrupted sample')
    .option('--json', 'Print the result as JSON', false)
    .action((options: { json: boolean }) => {
      const result = detect(SAMPLE_TEXT);

      if (options.json) {
        console.log(renderJson([{ path: 'sample', lossy: false, result }]));
      } else {
        console.log(renderReport(result, 'built-in sample'));
      }

      process.exitCode = exitCodeFor([result]);
    });
}
