import path from 'path';
import { CommandPolicyError } from './errors.js';

export type CommandPolicyMode = 'off' | 'audit' | 'enforce';

export type CommandPolicyContext = {
  source?: string;
  /** Defaults to the mode in `process.env`. */
  mode?: CommandPolicyMode;
};

/** Returns why an argv is refused, or null when it is allowed. */
type ArgvRule = (args: string[]) => string | null;

const LIST_ARGS = ['-Qqe'];
const REMOVE_FLAGS = ['-Rns', '--noconfirm'];

export function resolveCommandPolicyMode(env: NodeJS.ProcessEnv = process.env): CommandPolicyMode {
  switch (String(env.ARCH_HM_COMMAND_POLICY_MODE || '').trim().toLowerCase()) {
    case 'off':
    case '0':
    case 'false':
      return 'off';
    case 'audit':
      return 'audit';
    default:
      return 'enforce';
  }
}

function startsWith(args: string[], prefix: string[]) {
  return prefix.every((arg, i) => args[i] === arg);
}

function exactly(args: string[], expected: string[]) {
  return args.length === expected.length && startsWith(args, expected);
}

function removalTargets(tool: string, args: string[]): string | null {
  const targets = args.slice(REMOVE_FLAGS.length);
  if (targets.length === 0) return `${tool} -Rns requires at least one package`;
  const flagLike = targets.find((target) => !target || target.startsWith('-'));
  if (flagLike !== undefined) return `${tool} package argument not allowed: ${flagLike || '(empty)'}`;
  return null;
}

function packageManagerRule(tool: string): ArgvRule {
  return (args) => {
    if (exactly(args, LIST_ARGS)) return null;
    if (startsWith(args, REMOVE_FLAGS)) return removalTargets(tool, args);
    return `${tool} invocation not allowlisted: ${args.join(' ') || '(missing)'}`;
  };
}

const RULES: Record<string, ArgvRule> = {
  yay: packageManagerRule('yay'),
  pacman: packageManagerRule('pacman'),
  // Only the pacman fallback remover runs elevated.
  sudo: (args) => {
    if (args[0] !== 'pacman') return `sudo target not allowlisted: ${args[0] || '(missing)'}`;
    const rest = args.slice(1);
    if (!startsWith(rest, REMOVE_FLAGS)) return 'sudo is only allowlisted for pacman removal';
    return removalTargets('pacman', rest);
  },
  'home-manager': (args) =>
    exactly(args, ['packages']) ? null : `home-manager invocation not allowlisted: ${args.join(' ') || '(missing)'}`,
};

export function checkInvocation(command: string, args: string[]): string | null {
  const tool = path.basename(command || '');
  if (!tool) return 'empty command';
  if (args.some((arg) => /[\u0000\n\r]/.test(arg))) return 'argv contains unsafe characters';
  const rule = Object.hasOwn(RULES, tool) ? RULES[tool] : undefined;
  if (!rule) return `command not allowlisted: ${tool}`;
  return rule(args);
}

export function enforceCommandPolicy(command: string, args: string[], context: CommandPolicyContext = {}) {
  const mode = context.mode ?? resolveCommandPolicyMode();
  if (mode === 'off') return;

  const reason = checkInvocation(command, args);
  if (reason === null) return;

  const message = [
    'command policy violation',
    context.source ? `source=${context.source}` : '',
    `command=${path.basename(command || '')}`,
    `args=${JSON.stringify(args)}`,
    `reason=${reason}`,
  ]
    .filter(Boolean)
    .join(' ');

  if (mode === 'enforce') {
    throw new CommandPolicyError(message);
  }
  console.warn(message);
}
