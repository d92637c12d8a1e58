import { UnknownOptionError } from './errors.js';

export type CliOptions = {
  /** Skip the confirmation prompt. */
  yes: boolean;
  dryRun: boolean;
  /** Allow removing the AUR helper itself when it is a duplicate. */
  includeYay: boolean;
  help: boolean;
};

export const USAGE = [
  'Usage: arch-hm-reconcile [--yes|-y] [--dry-run] [--include-yay]',
  '',
  'Uninstall Arch packages that are also managed by Home-Manager.',
  '',
  '  -y, --yes          remove without asking for confirmation',
  '      --dry-run      only show what would be removed',
  "      --include-yay  allow removing 'yay' when it is a duplicate",
  '  -h, --help         show this help',
].join('\n');

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { yes: false, dryRun: false, includeYay: false, help: false };
  for (const arg of argv) {
    switch (arg) {
      case '--yes':
      case '-y':
        options.yes = true;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--include-yay':
        options.includeYay = true;
        break;
      case '-h':
      case '--help':
        // Arguments after the help flag are not parsed.
        return { ...options, help: true };
      default:
        throw new UnknownOptionError(arg);
    }
  }
  return options;
}
