export type NormalizeResult =
  | { ok: true; name: string }
  | { ok: false; reason: 'empty' | 'no-name' };

// Nix store basenames start with a 32 character base-32 hash.
const STORE_HASH_PREFIX = /^[0-9a-df-np-sv-z]{32}-/;
const VERSION_SUFFIX = /-[0-9][0-9A-Za-z._+~-]*$/;

/**
 * Reduces one line of `home-manager packages` output (`act-0.2.77`, or a
 * store/.drv path) to the bare package name.
 */
export function normalizeDeclarativeName(raw: string): NormalizeResult {
  let name = raw.trim();
  if (!name) return { ok: false, reason: 'empty' };

  const slash = name.lastIndexOf('/');
  if (slash >= 0) name = name.slice(slash + 1);
  if (name.endsWith('.drv')) name = name.slice(0, -'.drv'.length);
  name = name.replace(STORE_HASH_PREFIX, '');
  name = name.replace(VERSION_SUFFIX, '');

  if (!name) return { ok: false, reason: 'no-name' };
  return { ok: true, name };
}

export function parseDeclarativePackages(stdout: string): string[] {
  const names = new Set<string>();
  for (const line of stdout.split('\n')) {
    const result = normalizeDeclarativeName(line);
    if (result.ok) names.add(result.name);
  }
  return [...names].sort(compareNames);
}

export function parseInstalledPackages(stdout: string): ReadonlySet<string> {
  const names = new Set<string>();
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (trimmed) names.add(trimmed);
  }
  return names;
}

// Plain code-unit order, like `LC_ALL=C sort`.
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
