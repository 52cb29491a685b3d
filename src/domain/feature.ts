/**
 * Feature toggle domain model.
 *
 * A toggle is a named capability compiled into one build variant
 * (a cryptographic backend, a DNS resolver, a transport extension).
 * Toggles are grouped into categories whose kind decides how many
 * members one combination may carry.
 */

/** How many toggles of one category a combination may select. */
export type CategoryKind = 'exclusive' | 'additive';

export interface FeatureCategory {
  name: string;
  kind: CategoryKind;
  /** A combination without any member of a mandatory category is rejected. */
  mandatory: boolean;
  description?: string;
}

export interface FeatureToggle {
  /** The name the toolchain understands (e.g. a cargo feature). */
  name: string;
  category: string;
  /** Platform ids where the toggle can be built. Absent means everywhere. */
  platforms?: string[];
  /** Companion toggles that must be selected alongside this one. */
  requires?: string[];
  /** Extra toolchain packages a build selecting this toggle needs. */
  installs?: string[];
  description?: string;
}

/** The set of categories and toggles a pipeline validates against. */
export interface FeatureCatalog {
  categories: FeatureCategory[];
  toggles: FeatureToggle[];
}

/** An ordered selection of toggle names forming one build variant. */
export type FeatureCombination = readonly string[];

/**
 * Put a combination into canonical order: duplicates removed, known toggles
 * by category declaration order then toggle declaration order, unknown names
 * last in lexicographic order.
 */
export function canonicalizeCombination(catalog: FeatureCatalog, combination: FeatureCombination): string[] {
  const categoryRank = new Map(catalog.categories.map((c, i) => [c.name, i]));
  const toggleRank = new Map(catalog.toggles.map((t, i) => [t.name, i]));
  const toggleCategory = new Map(catalog.toggles.map((t) => [t.name, t.category]));

  const rank = (name: string): [number, number] => {
    const category = toggleCategory.get(name);
    const toggle = toggleRank.get(name);
    if (category === undefined || toggle === undefined) {
      return [Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER];
    }
    return [categoryRank.get(category) ?? Number.MAX_SAFE_INTEGER - 1, toggle];
  };

  return [...new Set(combination)].sort((a, b) => {
    const [ca, ta] = rank(a);
    const [cb, tb] = rank(b);
    if (ca !== cb) return ca - cb;
    if (ta !== tb) return ta - tb;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

/** Canonical key of a combination: names joined the way `--features` takes them. */
export function combinationKey(catalog: FeatureCatalog, combination: FeatureCombination): string {
  return canonicalizeCombination(catalog, combination).join(',');
}

/** Parse a comma-separated feature list ("a,b, c") into names. */
export function parseFeatureList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** Look up a toggle by name. */
export function findToggle(catalog: FeatureCatalog, name: string): FeatureToggle | undefined {
  return catalog.toggles.find((t) => t.name === name);
}

/** Look up a category by name. */
export function findCategory(catalog: FeatureCatalog, name: string): FeatureCategory | undefined {
  return catalog.categories.find((c) => c.name === name);
}
