/**
 * The configuration a user should hold in the vendor system.
 *
 * Produced fresh by every calculation and never stored. The visibility
 * profile and groups always travel together.
 */
export interface DesiredConfiguration {
  username: string;
  firstName: string;
  lastName: string;
  visibilityProfile: string;
  groups: ReadonlySet<string>;
  active: boolean;
}

/** Order-insensitive set equality. */
export function sameGroups(a: Iterable<string>, b: Iterable<string>): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const group of left) {
    if (!right.has(group)) return false;
  }
  return true;
}

export function configurationsEqual(a: DesiredConfiguration, b: DesiredConfiguration): boolean {
  return (
    a.username === b.username &&
    a.firstName === b.firstName &&
    a.lastName === b.lastName &&
    a.visibilityProfile === b.visibilityProfile &&
    a.active === b.active &&
    sameGroups(a.groups, b.groups)
  );
}

/** Plain JSON shape (groups sorted) for HTTP responses and logs. */
export function toConfigurationView(config: DesiredConfiguration): Omit<DesiredConfiguration, 'groups'> & { groups: string[] } {
  return { ...config, groups: [...config.groups].sort() };
}
