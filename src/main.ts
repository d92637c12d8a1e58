import { parseCliArgs, USAGE } from './cli.js';
import { resolveCommandPolicyMode } from './command-policy.js';
import { buildReconcileConfig, getListTimeoutMs } from './config.js';
import type { Confirmer } from './confirm.js';
import { alwaysConfirm, createTerminalConfirmer } from './confirm.js';
import { ReconcileError, UnknownOptionError, exitCodeForError } from './errors.js';
import { runReconciler } from './reconciler.js';
import type { Toolchain } from './toolchain.js';
import { detectToolchain } from './toolchain.js';

export type MainIo = {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
  detectToolchain?: () => Toolchain;
  confirmer?: Confirmer;
};

/** Runs the CLI and returns the process exit code. */
export async function main(argv: string[], io: MainIo): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      io.stdout.write(`${USAGE}\n`);
      return 0;
    }

    const confirmer = options.yes
      ? alwaysConfirm
      : io.confirmer ?? createTerminalConfirmer(io.stdin, io.stdout);

    await runReconciler(options, {
      detectToolchain:
        io.detectToolchain ??
        (() =>
          detectToolchain({
            timeoutMs: getListTimeoutMs(io.env),
            policyMode: resolveCommandPolicyMode(io.env),
          })),
      config: buildReconcileConfig(io.env),
      confirmer,
      stdout: io.stdout,
    });
    return 0;
  } catch (err) {
    if (err instanceof UnknownOptionError) {
      io.stderr.write(`${err.message}\n${USAGE}\n`);
    } else if (err instanceof ReconcileError) {
      io.stderr.write(`Error: ${err.message}\n`);
    } else {
      console.error('reconcile.failed:', err instanceof Error ? err.message : err);
    }
    return exitCodeForError(err);
  }
}
