import { afterEach, describe, expect, it } from 'vitest';
import { CommandPolicyError } from '../src/errors.js';
import { runCommand, runCommandInteractive } from '../src/exec.js';

describe('exec', () => {
  const originalMode = process.env.ARCH_HM_COMMAND_POLICY_MODE;

  afterEach(() => {
    if (originalMode === undefined) {
      delete process.env.ARCH_HM_COMMAND_POLICY_MODE;
    } else {
      process.env.ARCH_HM_COMMAND_POLICY_MODE = originalMode;
    }
  });

  it('captures output and the exit code', async () => {
    const result = await runCommand('bash', ['-c', 'printf out; printf err >&2; exit 3'], 5000, { policyMode: 'off' });
    expect(result).toEqual({ code: 3, stdout: 'out', stderr: 'err', timedOut: false });
  });

  it('returns on timeout even when a grandchild keeps the pipes open', async () => {
    const started = Date.now();
    const result = await runCommand('bash', ['-c', 'sleep 2 & wait'], 300, { policyMode: 'off' });
    const elapsed = Date.now() - started;

    expect(result.timedOut).toBe(true);
    expect(result.code).toBe(1);
    expect(elapsed).toBeLessThan(1500);
  });

  it('rejects when the command cannot be started', async () => {
    await expect(runCommand('arch-hm-no-such-tool', [], 1000, { policyMode: 'off' })).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  it('resolves the exit code of an interactive command', async () => {
    await expect(runCommandInteractive('bash', ['-c', 'exit 5'], { policyMode: 'off' })).resolves.toBe(5);
  });

  it('applies the policy mode it is given over the environment', async () => {
    process.env.ARCH_HM_COMMAND_POLICY_MODE = 'off';
    await expect(runCommand('bash', ['-c', 'exit 0'], 1000, { policyMode: 'enforce' })).rejects.toBeInstanceOf(
      CommandPolicyError,
    );
  });
});
