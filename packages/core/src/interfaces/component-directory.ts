/**
 * Lookup of component aliases known to the target control system
 */
export interface ComponentDirectory {
  /**
   * Return the subset of `aliases` that exist as components.
   * Implementations must accept an empty list.
   */
  findExistingAliases(aliases: string[]): Promise<Set<string>>;
}
