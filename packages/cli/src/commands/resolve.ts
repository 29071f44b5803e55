/**
 * confgate resolve: Print the schema node a data path resolves to
 */

import { Command } from 'commander';
import { describeNode } from '../output/format.js';
import { fail, loadTree, print } from './shared.js';

export const resolveCommand = new Command('resolve')
  .description('Resolve a data path against the schema and describe the node')
  .argument('<schema>', 'Path to the compiled schema artifact (JSON)')
  .argument('<path>', "Data path, e.g. /interfaces/interface[name='eth0']/mtu")
  .action((schema: string, path: string) => {
    const tree = loadTree(schema);
    if (tree === null) return;
    const resolved = tree.resolve(path);
    if (!resolved.ok) {
      fail(`Not found (${resolved.reason}): ${resolved.detail}`);
      return;
    }
    print(describeNode(resolved.node, resolved.instancePath));
  });
