import type { CliOptions } from './cli.js';
import type { ReconcileConfig } from './config.js';
import type { Confirmer } from './confirm.js';
import { buildRemovalPlan, findDuplicates } from './reconcile.js';
import type { Toolchain } from './toolchain.js';
import { describeRemoval } from './toolchain.js';

export type ReconcilerDeps = {
  detectToolchain: () => Toolchain;
  config: ReconcileConfig;
  confirmer: Confirmer;
  stdout: NodeJS.WritableStream;
};

export type ReconcileOutcome =
  | 'no-duplicates'
  | 'nothing-to-remove'
  | 'dry-run'
  | 'cancelled'
  | 'removed';

/**
 * One pass: list both sides, report the overlap and, unless told otherwise,
 * remove the Arch copies. Every early return is a successful outcome; tool
 * and command failures surface as thrown errors.
 */
export async function runReconciler(
  options: Pick<CliOptions, 'yes' | 'dryRun' | 'includeYay'>,
  deps: ReconcilerDeps,
): Promise<ReconcileOutcome> {
  const { config, stdout } = deps;
  const print = (line = '') => {
    stdout.write(`${line}\n`);
  };

  const toolchain = deps.detectToolchain();
  const installed = await toolchain.listInstalled();
  const declarative = await toolchain.listDeclarative();

  const duplicates = findDuplicates(declarative, installed, config);
  if (duplicates.length === 0) {
    print('No Arch/Home-Manager duplicates detected.');
    return 'no-duplicates';
  }

  print('Duplicates detected (Arch -> Nix):');
  for (const { imperative, declarative: nix } of duplicates) {
    print(`  ${imperative} -> ${nix}`);
  }

  const plan = buildRemovalPlan(duplicates, { includeProtected: options.includeYay }, config);
  if (plan.packages.length === 0) {
    print();
    print(
      `Nothing to uninstall (only '${config.protectedPackage}' matched, ignored without --include-yay).`,
    );
    return 'nothing-to-remove';
  }

  print();
  print(`Total to uninstall on Arch side: ${plan.packages.length} package(s)`);
  for (const pkg of plan.packages) {
    print(`  ${pkg}`);
  }
  if (plan.protectedSkipped) {
    print(`  (skipping '${config.protectedPackage}', pass --include-yay to remove it)`);
  }

  if (options.dryRun) {
    print();
    print('[Dry-run] No uninstallation will be performed.');
    return 'dry-run';
  }

  const removal = describeRemoval(toolchain.imperative);
  if (!options.yes) {
    const confirmed = await deps.confirmer.confirm(`Confirm removal via '${removal}'? [y/N] `);
    if (!confirmed) {
      print('Cancelled.');
      return 'cancelled';
    }
  }

  if (toolchain.imperative === 'pacman') {
    print(`Warning: 'yay' not found, falling back to '${removal}'.`);
  }
  await toolchain.remove(plan.packages);
  return 'removed';
}
