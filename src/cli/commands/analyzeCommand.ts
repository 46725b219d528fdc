import { Command } from 'commander';
import { executeHandler } from '../types';

/** Options every command that needs a graph accepts. */
export function withGraphSourceOptions(cmd: Command): Command {
  return cmd
    .option('-p, --path <path>', 'Project root containing .v files', '.')
    .option('--mode <mode>', 'Front-end: auto|heuristic|metadata', 'auto')
    .option('--glob-dir <dir>', 'Extra directory searched for .glob metadata files')
    .option('--from <file>', 'Load a graph exported by "analyze --out" instead of analyzing')
    .option('--workers <n>', 'Files scanned concurrently')
    .option('--batch-size <n>', 'Files handed to the scheduler per batch')
    .option('--unterminated <policy>', 'Status for proofs with no terminator: unterminated|proved')
    .option('--max-statement-length <n>', 'Truncate statements past this many characters');
}

export const analyzeCommand = withGraphSourceOptions(
  new Command('analyze').description('Build the dependency graph and print statistics'),
)
  .option('-o, --out <file>', 'Write the graph as flat JSON records')
  .option('--symbols', 'Include a summary of every symbol', false)
  .action(async (options) => {
    await executeHandler('analyze', options);
  });
