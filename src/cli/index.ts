#!/usr/bin/env node
import { Command } from 'commander';
import { scanCommand } from './commands/scan.js';
import { sampleCommand } from './commands/sample.js';
import { rulesCommand } from './commands/rules.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('mojiscan')
  .description('Detect mojibake (mis-decoded UTF-8) in text files')
  .version('0.1.0');

program.addCommand(scanCommand());
program.addCommand(sampleCommand());
program.addCommand(rulesCommand());
program.addCommand(serveCommand());

await program.parseAsync();
