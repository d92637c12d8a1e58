import type { ReconcileConfig } from './config.js';

export type DuplicateEntry = {
  imperative: string;
  declarative: string;
};

export type RemovalPlan = {
  packages: string[];
  /** The protected package matched but was left out of `packages`. */
  protectedSkipped: boolean;
};

export type RemovalPlanOptions = {
  includeProtected: boolean;
};

/**
 * Finds the Arch package that provides `declarative`: the same name, then the
 * mapped name, then the mapped (or same) name with each suffix variant.
 * Returns null when none of them is installed.
 */
export function resolveImperativeName(
  declarative: string,
  installed: ReadonlySet<string>,
  config: ReconcileConfig,
): string | null {
  if (installed.has(declarative)) return declarative;
  const candidate = config.nameMapping.get(declarative) ?? declarative;
  if (installed.has(candidate)) return candidate;
  for (const suffix of config.suffixVariants) {
    const variant = `${candidate}${suffix}`;
    if (installed.has(variant)) return variant;
  }
  return null;
}

export function findDuplicates(
  declarativeNames: Iterable<string>,
  installed: ReadonlySet<string>,
  config: ReconcileConfig,
): DuplicateEntry[] {
  const seen = new Set<string>();
  const duplicates: DuplicateEntry[] = [];
  for (const declarative of declarativeNames) {
    const imperative = resolveImperativeName(declarative, installed, config);
    if (imperative === null) continue;
    // NUL cannot appear in a package name, so it is a safe pair separator.
    const key = `${imperative}\u0000${declarative}`;
    if (seen.has(key)) continue;
    seen.add(key);
    duplicates.push({ imperative, declarative });
  }
  return duplicates;
}

export function buildRemovalPlan(
  duplicates: readonly DuplicateEntry[],
  options: RemovalPlanOptions,
  config: ReconcileConfig,
): RemovalPlan {
  const packages: string[] = [];
  let protectedMatched = false;
  for (const { imperative } of duplicates) {
    if (imperative === config.protectedPackage) {
      protectedMatched = true;
      continue;
    }
    if (!packages.includes(imperative)) packages.push(imperative);
  }

  // The helper itself is always the last target.
  if (protectedMatched && options.includeProtected) {
    packages.push(config.protectedPackage);
  }

  return {
    packages,
    protectedSkipped: protectedMatched && !options.includeProtected,
  };
}
