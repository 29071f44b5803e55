/**
 * confgate check: Build a schema artifact and report what it defines
 */

import { Command } from 'commander';
import { t } from '../output/theme.js';
import { loadTree, print } from './shared.js';

export const checkCommand = new Command('check')
  .description('Build the constraint tree from a schema artifact; exit 1 with every build issue on failure')
  .argument('<schema>', 'Path to the compiled schema artifact (JSON)')
  .action((schema: string) => {
    const tree = loadTree(schema);
    if (tree === null) return;
    print(`${t.green('ok')}  ${schema}`);
    print(`  modules:    ${tree.modules().length}  (${tree.modules().join(', ')})`);
    print(`  nodes:      ${tree.nodeCount}`);
    print(`  identities: ${tree.identities.size}`);
  });
