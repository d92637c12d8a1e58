import { spawn } from 'child_process';
import type { CommandPolicyMode } from './command-policy.js';
import { enforceCommandPolicy } from './command-policy.js';

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type CommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  policyMode?: CommandPolicyMode;
};

export function runCommand(
  command: string,
  args: string[],
  timeoutMs: number,
  options: CommandOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    enforceCommandPolicy(command, args, { source: 'exec.runCommand', mode: options.policyMode });
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd: options.cwd,
      env: options.env,
    });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
      // Grandchildren may still hold the pipes open; 'close' waits for them otherwise.
      child.stdout.destroy();
      child.stderr.destroy();
    }, timeoutMs);
    child.stdout.on('data', (chunk) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk) => {
      stderr += chunk.toString();
    });
    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({ code: code ?? 1, stdout, stderr, timedOut });
    });
  });
}

/**
 * Runs a command attached to the caller's terminal so it can prompt (sudo
 * password, pacman's own questions). Resolves with the exit code.
 */
export function runCommandInteractive(
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<number> {
  return new Promise((resolve, reject) => {
    enforceCommandPolicy(command, args, { source: 'exec.runCommandInteractive', mode: options.policyMode });
    const child = spawn(command, args, {
      stdio: 'inherit',
      cwd: options.cwd,
      env: options.env,
    });
    child.on('error', reject);
    child.on('close', (code) => {
      resolve(code ?? 1);
    });
  });
}
