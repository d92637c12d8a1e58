export class ReconcileError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ToolNotFoundError extends ReconcileError {
  readonly tools: string[];

  constructor(tools: string[], message: string) {
    super(message, 1);
    this.tools = tools;
  }
}

export class UnknownOptionError extends ReconcileError {
  readonly option: string;

  constructor(option: string) {
    super(`Unknown option: ${option}`, 2);
    this.option = option;
  }
}

/**
 * A spawned package manager command failed. `exitCode` is the child's own code
 * so the CLI can hand it straight back to the shell.
 */
export class ExternalCommandError extends ReconcileError {
  readonly command: string;
  readonly args: string[];
  readonly stderr: string;

  constructor(command: string, args: string[], code: number, stderr = '') {
    const detail = stderr.trim();
    super(
      `${command} ${args.join(' ')} exited with code ${code}${detail ? `: ${detail}` : ''}`,
      code === 0 ? 1 : code,
    );
    this.command = command;
    this.args = args;
    this.stderr = stderr;
  }
}

/** The command could not be started at all (missing binary, permissions). */
export class CommandSpawnError extends ReconcileError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super(`could not run '${command}': ${cause instanceof Error ? cause.message : String(cause)}`, 1);
    this.command = command;
  }
}

export class CommandPolicyError extends ReconcileError {
  constructor(message: string) {
    super(message, 1);
  }
}

export function exitCodeForError(error: unknown): number {
  if (error instanceof ReconcileError) return error.exitCode;
  return 1;
}
