/**
 * confgate authorize: Evaluate one access decision against a policy file
 */

import { Command } from 'commander';
import { Operation, PolicyStore, Session, authorize } from '@confgate/kernel';
import { formatDecision } from '../output/format.js';
import { fail, loadPolicy, print } from './shared.js';

const OPERATIONS: ReadonlyArray<string> = Object.values(Operation);

function isOperation(value: string): value is Operation {
  return OPERATIONS.includes(value);
}

export const authorizeCommand = new Command('authorize')
  .description('Decide whether a principal class may perform an operation on a module')
  .argument('<policy>', 'Path to the policy document (JSON)')
  .argument('<module>', 'Module name')
  .argument('<operation>', `One of: ${OPERATIONS.join(', ')}`)
  .requiredOption('--class <class>', 'Principal class')
  .action((policyPath: string, module: string, operation: string, options: { class: string }) => {
    if (!isOperation(operation)) {
      fail(`Unknown operation "${operation}". Expected one of: ${OPERATIONS.join(', ')}`);
      return;
    }
    const entries = loadPolicy(policyPath);
    if (entries === null) return;

    const session = new Session({
      principal: { id: 'cli', principal_class: options.class },
      policies: new PolicyStore(entries),
    });
    const decision = authorize(session, module, operation);
    print(formatDecision(decision));
    if (!decision.granted) process.exitCode = 1;
  });
