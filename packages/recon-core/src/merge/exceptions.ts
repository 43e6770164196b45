/**
 * Named exceptions to the general reconciliation rules.
 * New RTU or device quirks are added here as data.
 */

export interface AliasSubstitution {
  /** Last alias segment on the point side (e.g. `TCP`) */
  pointId: string;
  /** Last alias segment its controls are recorded under (e.g. `TAP`) */
  controlPointId: string;
}

export interface ReconExceptions {
  aliasSubstitutions: AliasSubstitution[];
  /** Engineering RTU names whose points are left out of the merge */
  excludedPointRtus: string[];
  /** Inventory RTU names (with `_RTU` suffix) dropped on import */
  excludedInventoryRtus: string[];
}

export const DEFAULT_EXCEPTIONS: ReconExceptions = {
  aliasSubstitutions: [{ pointId: 'TCP', controlPointId: 'TAP' }],
  excludedPointRtus: ['MICR4'],
  excludedInventoryRtus: ['CUMW_RTU'],
};

export function resolveExceptions(overrides: Partial<ReconExceptions> = {}): ReconExceptions {
  return {
    aliasSubstitutions: overrides.aliasSubstitutions ?? DEFAULT_EXCEPTIONS.aliasSubstitutions,
    excludedPointRtus: overrides.excludedPointRtus ?? DEFAULT_EXCEPTIONS.excludedPointRtus,
    excludedInventoryRtus: overrides.excludedInventoryRtus ?? DEFAULT_EXCEPTIONS.excludedInventoryRtus,
  };
}

function replaceLastSegment(alias: string, from: string, to: string): string | null {
  const cut = alias.lastIndexOf('/');
  const last = alias.slice(cut + 1);
  return last === from ? `${alias.slice(0, cut + 1)}${to}` : null;
}

/**
 * Alias the CTRL tab uses for a point's controls
 */
export function controlAliasFor(pointAlias: string, exceptions: ReconExceptions): string {
  for (const substitution of exceptions.aliasSubstitutions) {
    const swapped = replaceLastSegment(pointAlias, substitution.pointId, substitution.controlPointId);
    if (swapped !== null) return swapped;
  }
  return pointAlias;
}

/**
 * Inverse of {@link controlAliasFor}: the point alias a control belongs to
 */
export function pointAliasFor(controlAlias: string, exceptions: ReconExceptions): string {
  for (const substitution of exceptions.aliasSubstitutions) {
    const swapped = replaceLastSegment(controlAlias, substitution.controlPointId, substitution.pointId);
    if (swapped !== null) return swapped;
  }
  return controlAlias;
}
