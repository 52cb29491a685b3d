/**
 * FeatureSet Validator.
 *
 * Decides whether one feature combination may be built on one platform,
 * before any build resource is allocated. Pure: no I/O, no logging.
 */

import { TypedError, createTypedError } from '../domain/errors';
import {
  FeatureCatalog,
  FeatureCombination,
  canonicalizeCombination,
  findCategory,
  findToggle,
} from '../domain/feature';

/** Why a combination was refused. */
export type RejectionCode =
  | 'INVALID_COMBINATION.UNKNOWN_TOGGLE'
  | 'INVALID_COMBINATION.UNSUPPORTED_PLATFORM'
  | 'INVALID_COMBINATION.CONFLICT'
  | 'INVALID_COMBINATION.MISSING_COMPANION'
  | 'INVALID_COMBINATION.MANDATORY_CATEGORY';

export type CombinationVerdict =
  | { valid: true }
  | { valid: false; code: RejectionCode; reason: string; details: Record<string, unknown> };

/** Catalog validation result. */
export interface CatalogValidationResult {
  valid: boolean;
  errors: TypedError[];
}

function reject(code: RejectionCode, reason: string, details: Record<string, unknown>): CombinationVerdict {
  return { valid: false, code, reason, details };
}

/**
 * Validate a candidate combination for a platform.
 *
 * Rules are checked in a fixed order (unknown toggle, platform support,
 * exclusive-category conflict, missing companion, mandatory category) and
 * the first rule that fails decides the verdict.
 */
export function validateCombination(
  catalog: FeatureCatalog,
  combination: FeatureCombination,
  platform: string,
): CombinationVerdict {
  const selected = canonicalizeCombination(catalog, combination);
  const selectedSet = new Set(selected);

  for (const name of selected) {
    if (!findToggle(catalog, name)) {
      return reject('INVALID_COMBINATION.UNKNOWN_TOGGLE', `unknown toggle ${name}`, { toggle: name });
    }
  }

  for (const name of selected) {
    const toggle = findToggle(catalog, name);
    if (toggle?.platforms && !toggle.platforms.includes(platform)) {
      return reject(
        'INVALID_COMBINATION.UNSUPPORTED_PLATFORM',
        `toggle ${name} unsupported on platform ${platform}`,
        { toggle: name, platform, supportedPlatforms: toggle.platforms },
      );
    }
  }

  for (const category of catalog.categories) {
    if (category.kind !== 'exclusive') continue;
    const members = selected.filter((name) => findToggle(catalog, name)?.category === category.name);
    if (members.length > 1) {
      return reject(
        'INVALID_COMBINATION.CONFLICT',
        `conflicting toggles in category ${category.name}`,
        { category: category.name, toggles: members },
      );
    }
  }

  for (const name of selected) {
    for (const companion of findToggle(catalog, name)?.requires ?? []) {
      if (!selectedSet.has(companion)) {
        return reject(
          'INVALID_COMBINATION.MISSING_COMPANION',
          `missing required companion ${companion} for ${name}`,
          { toggle: name, companion },
        );
      }
    }
  }

  for (const category of catalog.categories) {
    if (!category.mandatory) continue;
    const present = selected.some((name) => findToggle(catalog, name)?.category === category.name);
    if (!present) {
      return reject(
        'INVALID_COMBINATION.MANDATORY_CATEGORY',
        `missing mandatory category ${category.name}`,
        { category: category.name },
      );
    }
  }

  return { valid: true };
}

/** Validate the catalog itself: names, category references, companion references. */
export function validateCatalog(catalog: FeatureCatalog): CatalogValidationResult {
  const errors: TypedError[] = [];

  const seenCategories = new Set<string>();
  for (const category of catalog.categories) {
    if (seenCategories.has(category.name)) {
      errors.push(catalogError('VALIDATION.DUPLICATE_CATEGORY', `Duplicate category: ${category.name}`));
    }
    seenCategories.add(category.name);
  }

  const seenToggles = new Set<string>();
  for (const toggle of catalog.toggles) {
    if (seenToggles.has(toggle.name)) {
      errors.push(catalogError('VALIDATION.DUPLICATE_TOGGLE', `Duplicate toggle: ${toggle.name}`));
    }
    seenToggles.add(toggle.name);

    if (toggle.name.includes(',') || toggle.name.trim() !== toggle.name || toggle.name.length === 0) {
      errors.push(catalogError('VALIDATION.INVALID_TOGGLE_NAME', `Invalid toggle name: "${toggle.name}"`));
    }

    const category = findCategory(catalog, toggle.category);
    if (!category) {
      errors.push(
        catalogError('VALIDATION.UNKNOWN_CATEGORY', `Toggle "${toggle.name}" references unknown category "${toggle.category}"`, {
          availableCategories: [...seenCategories],
        }),
      );
      continue;
    }

    for (const companion of toggle.requires ?? []) {
      const required = findToggle(catalog, companion);
      if (!required) {
        errors.push(
          catalogError('VALIDATION.UNKNOWN_COMPANION', `Toggle "${toggle.name}" requires unknown toggle "${companion}"`),
        );
      } else if (category.kind === 'exclusive' && required.category === category.name) {
        errors.push(
          catalogError(
            'VALIDATION.UNSATISFIABLE_COMPANION',
            `Toggle "${toggle.name}" requires "${companion}" from its own exclusive category "${category.name}"`,
          ),
        );
      }
    }
  }

  return { valid: errors.length === 0, errors };
}

function catalogError(code: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code, message, details });
}
