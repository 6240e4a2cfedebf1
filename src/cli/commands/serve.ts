import { Command } from 'commander';
import chalk from 'chalk';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server')
    .option('-c, --config <path>', 'Config file with extra patterns and rules')
    .option('-p, --project <path>', 'Project root path', process.cwd())
    .action(async (options: { config?: string; project: string }) => {
      // stdout belongs to the transport
      console.error(chalk.bold('Starting MCP server...\n'));
      console.error(`  Project: ${options.project}`);
      console.error(`  Transport: stdio\n`);

      // Dynamic import to avoid loading MCP deps when not needed
      const { startServer } = await import('../../mcp/server.js');
      await startServer({ projectRoot: options.project, configPath: options.config });
    });
}
