/**
 * The only supported report scopes: everything, one RTU or one substation
 */
export type ReconScope =
  | { kind: 'all' }
  | { kind: 'rtu'; name: string }
  | { kind: 'substation'; name: string };

export const ALL_SCOPE: ReconScope = { kind: 'all' };

/** Key of the scope in the merged-view cache and in output file names */
export function scopeKey(scope: ReconScope): string {
  switch (scope.kind) {
    case 'all':
      return 'all';
    case 'rtu':
      return `rtu-${scope.name}`;
    case 'substation':
      return `sub-${scope.name}`;
    default: {
      const exhaustive: never = scope;
      throw new Error(`Unknown scope: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** Column a scope filters on */
export function scopeColumn(scope: ReconScope): 'RTU' | 'Sub' | null {
  switch (scope.kind) {
    case 'all':
      return null;
    case 'rtu':
      return 'RTU';
    case 'substation':
      return 'Sub';
    default: {
      const exhaustive: never = scope;
      throw new Error(`Unknown scope: ${JSON.stringify(exhaustive)}`);
    }
  }
}
