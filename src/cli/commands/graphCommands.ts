import { Command } from 'commander';
import { executeHandler } from '../types';
import { withGraphSourceOptions } from './analyzeCommand';

export const graphCommand = new Command('graph')
  .description('Query symbol dependencies, taint and blast radius')
  .addCommand(
    withGraphSourceOptions(new Command('show'))
      .description('Show one symbol with its edges and taint')
      .argument('<name>', 'Qualified or bare symbol name')
      .action(async (name, options) => {
        await executeHandler('graph:show', { name, ...options });
      })
  )
  .addCommand(
    withGraphSourceOptions(new Command('deps'))
      .description('List what a symbol depends on')
      .argument('<name>', 'Qualified or bare symbol name')
      .action(async (name, options) => {
        await executeHandler('graph:deps', { name, ...options });
      })
  )
  .addCommand(
    withGraphSourceOptions(new Command('dependents'))
      .description('List what depends on a symbol')
      .argument('<name>', 'Qualified or bare symbol name')
      .option('--transitive', 'Follow dependents transitively', false)
      .action(async (name, options) => {
        await executeHandler('graph:dependents', { name, ...options });
      })
  )
  .addCommand(
    withGraphSourceOptions(new Command('blast'))
      .description('Blast radius of a symbol, or the ranking of admitted symbols')
      .argument('[name]', 'Qualified or bare symbol name')
      .option('--limit <n>', 'Limit results', '50')
      .action(async (name, options) => {
        await executeHandler('graph:blast', { name, ...options });
      })
  )
  .addCommand(
    withGraphSourceOptions(new Command('unused'))
      .description('List symbols nothing depends on')
      .option('--limit <n>', 'Limit results', '500')
      .action(async (options) => {
        await executeHandler('graph:unused', options);
      })
  )
  .addCommand(
    withGraphSourceOptions(new Command('tainted'))
      .description('List symbols resting on admitted proofs or axioms')
      .option('--limit <n>', 'Limit results', '500')
      .action(async (options) => {
        await executeHandler('graph:tainted', options);
      })
  );
