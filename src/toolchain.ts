import { getListTimeoutMs } from './config.js';
import type { CommandPolicyMode } from './command-policy.js';
import { CommandSpawnError, ExternalCommandError, ReconcileError, ToolNotFoundError } from './errors.js';
import { runCommand, runCommandInteractive } from './exec.js';
import { commandExists } from './lib/path-lookup.js';
import { parseDeclarativePackages, parseInstalledPackages } from './lib/package-names.js';

export type ImperativeManager = 'yay' | 'pacman';

export type CommandSpec = {
  command: string;
  args: string[];
};

/** The package managers a run talks to, resolved once up front. */
export type Toolchain = {
  imperative: ImperativeManager;
  listInstalled(): Promise<ReadonlySet<string>>;
  listDeclarative(): Promise<string[]>;
  remove(packages: string[]): Promise<void>;
};

export type DetectToolchainOptions = {
  exists?: (name: string) => boolean;
  timeoutMs?: number;
  policyMode?: CommandPolicyMode;
};

export function listCommand(manager: ImperativeManager): CommandSpec {
  return { command: manager, args: ['-Qqe'] };
}

export function removalCommand(manager: ImperativeManager, packages: string[]): CommandSpec {
  if (manager === 'yay') {
    return { command: 'yay', args: ['-Rns', '--noconfirm', ...packages] };
  }
  return { command: 'sudo', args: ['pacman', '-Rns', '--noconfirm', ...packages] };
}

/** Short form shown to the user, e.g. `sudo pacman -Rns`. */
export function describeRemoval(manager: ImperativeManager): string {
  return manager === 'yay' ? 'yay -Rns' : 'sudo pacman -Rns';
}

function asSpawnFailure(spec: CommandSpec, err: unknown): Error {
  if (err instanceof ReconcileError) return err;
  return new CommandSpawnError(spec.command, err);
}

async function capture(spec: CommandSpec, timeoutMs: number, policyMode?: CommandPolicyMode): Promise<string> {
  const result = await runCommand(spec.command, spec.args, timeoutMs, { policyMode }).catch((err: unknown) => {
    throw asSpawnFailure(spec, err);
  });
  if (result.timedOut) {
    throw new ExternalCommandError(spec.command, spec.args, result.code, `timed out after ${timeoutMs}ms`);
  }
  if (result.code !== 0) {
    throw new ExternalCommandError(spec.command, spec.args, result.code, result.stderr);
  }
  return result.stdout;
}

export function detectToolchain(options: DetectToolchainOptions = {}): Toolchain {
  const exists = options.exists ?? ((name: string) => commandExists(name));
  const timeoutMs = options.timeoutMs ?? getListTimeoutMs();
  const { policyMode } = options;

  let imperative: ImperativeManager;
  if (exists('yay')) {
    imperative = 'yay';
  } else if (exists('pacman')) {
    imperative = 'pacman';
  } else {
    throw new ToolNotFoundError(['yay', 'pacman'], "neither 'yay' nor 'pacman' found in PATH.");
  }
  if (!exists('home-manager')) {
    throw new ToolNotFoundError(['home-manager'], "'home-manager' not found in PATH.");
  }
  // The pacman fallback removes through sudo.
  if (imperative === 'pacman' && !exists('sudo')) {
    throw new ToolNotFoundError(['sudo'], "'sudo' not found in PATH (needed for the pacman fallback).");
  }

  return {
    imperative,
    async listInstalled() {
      return parseInstalledPackages(await capture(listCommand(imperative), timeoutMs, policyMode));
    },
    async listDeclarative() {
      return parseDeclarativePackages(await capture({ command: 'home-manager', args: ['packages'] }, timeoutMs, policyMode));
    },
    async remove(packages) {
      const spec = removalCommand(imperative, packages);
      const code = await runCommandInteractive(spec.command, spec.args, { policyMode }).catch((err: unknown) => {
        throw asSpawnFailure(spec, err);
      });
      if (code !== 0) {
        throw new ExternalCommandError(spec.command, spec.args, code);
      }
    },
  };
}
