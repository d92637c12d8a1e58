export type ReconcileConfig = {
  /** Home-Manager name -> Arch name, for packages named differently in the two ecosystems. */
  readonly nameMapping: ReadonlyMap<string, string>;
  readonly suffixVariants: readonly string[];
  /** The AUR helper's own package; never removed unless explicitly allowed. */
  readonly protectedPackage: string;
};

const DEFAULT_NAME_MAPPING: ReadonlyArray<readonly [string, string]> = [
  ['kubernetes-helm', 'helm'],
  ['yq-go', 'go-yq'],
  ['zoom-us', 'zoom'],
  ['kubelogin-oidc', 'kubelogin'],
  ['qbittorrent-enhanced', 'qbittorrent'],
];

export const DEFAULT_SUFFIX_VARIANTS = Object.freeze(['-bin', '-git', '-bin-git'] as const);

export const DEFAULT_RECONCILE_CONFIG: ReconcileConfig = Object.freeze({
  nameMapping: new Map(DEFAULT_NAME_MAPPING),
  suffixVariants: DEFAULT_SUFFIX_VARIANTS,
  protectedPackage: 'yay',
});

const DEFAULT_LIST_TIMEOUT_MS = 60_000;
const MIN_LIST_TIMEOUT_MS = 1_000;
const MAX_LIST_TIMEOUT_MS = 600_000;

export function getListTimeoutMs(env: NodeJS.ProcessEnv = process.env): number {
  const raw = String(env.ARCH_HM_LIST_TIMEOUT_MS || '').trim();
  if (!raw) return DEFAULT_LIST_TIMEOUT_MS;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return DEFAULT_LIST_TIMEOUT_MS;
  if (parsed < MIN_LIST_TIMEOUT_MS) return MIN_LIST_TIMEOUT_MS;
  if (parsed > MAX_LIST_TIMEOUT_MS) return MAX_LIST_TIMEOUT_MS;
  return parsed;
}

/**
 * Parses `nix=arch` pairs separated by commas or whitespace. Malformed pairs
 * are reported back instead of being applied.
 */
export function parseExtraMappings(raw: string): { mappings: Array<[string, string]>; invalid: string[] } {
  const mappings: Array<[string, string]> = [];
  const invalid: string[] = [];
  for (const token of raw.split(/[\s,]+/)) {
    if (!token) continue;
    const eq = token.indexOf('=');
    const from = eq > 0 ? token.slice(0, eq) : '';
    const to = eq > 0 ? token.slice(eq + 1) : '';
    if (!from || !to || to.includes('=')) {
      invalid.push(token);
      continue;
    }
    mappings.push([from, to]);
  }
  return { mappings, invalid };
}

export function buildReconcileConfig(
  env: NodeJS.ProcessEnv = process.env,
  base: ReconcileConfig = DEFAULT_RECONCILE_CONFIG,
): ReconcileConfig {
  const { mappings, invalid } = parseExtraMappings(String(env.ARCH_HM_EXTRA_MAPPINGS || ''));
  if (invalid.length > 0) {
    console.warn(`config.extra_mappings: ignoring malformed entries: ${invalid.join(', ')}`);
  }
  if (mappings.length === 0) return base;
  return Object.freeze({
    ...base,
    nameMapping: new Map([...base.nameMapping, ...mappings]),
  });
}
