export type SubmitterKind = 'HO' | 'BR';

const SUBMITTER_GROUPS: Readonly<Record<string, Readonly<Record<SubmitterKind, string>>>> = {
  US: { HO: 'US Home Office Submitters', BR: 'US Field Submitters' },
  CA: { HO: 'CAN Home Office Submitters', BR: 'CAN Field Submitters' },
};

/** Null when the country has no submitter groups. */
export function submitterGroup(country: string | null, kind: SubmitterKind): string | null {
  if (!country) return null;
  return SUBMITTER_GROUPS[country.toUpperCase()]?.[kind] ?? null;
}
