import type { UserUpdateInput } from '../../domain/models/user.model';
import { usernameFromReference } from '../integrations/directory/directory-user.mapper';

export const DIRECTORY_PROPERTIES = [
  'manager',
  'title',
  'distinguishedName',
  'enabled',
  'employeeId',
  'country',
  'name',
] as const;

export type DirectoryProperty = (typeof DIRECTORY_PROPERTIES)[number];

export interface PropertyRule {
  /** Impactful changes also recompute the user's direct reports. */
  readonly impactful: boolean;
  apply(value: string | null): UserUpdateInput;
}

const text = (value: string | null): string | null => {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
};

/** Every recognised directory property and how it lands on the user row. */
export const PROPERTY_RULES: { readonly [P in DirectoryProperty]: PropertyRule } = {
  manager: {
    impactful: false,
    apply: (value) => ({ managerUsername: usernameFromReference(value) }),
  },
  title: {
    impactful: true,
    apply: (value) => ({ title: text(value) }),
  },
  distinguishedName: {
    impactful: true,
    apply: (value) => ({ distinguishedName: text(value) }),
  },
  enabled: {
    impactful: false,
    apply: (value) => ({ active: text(value)?.toLowerCase() === 'true' }),
  },
  employeeId: {
    impactful: false,
    apply: (value) => ({ employeeId: text(value) }),
  },
  country: {
    impactful: true,
    apply: (value) => ({ country: text(value)?.toUpperCase() ?? null }),
  },
  /** Display-name changes are recognised but not mirrored. */
  name: {
    impactful: false,
    apply: () => ({}),
  },
};

/** Directory attribute names that land on a tracked property. */
const PROPERTY_ALIASES: Readonly<Record<string, DirectoryProperty>> = {
  'ej-irnumber': 'employeeId',
  state: 'country',
};

const BY_LOWER_NAME = new Map<string, DirectoryProperty>([
  ...DIRECTORY_PROPERTIES.map((p): [string, DirectoryProperty] => [p.toLowerCase(), p]),
  ...Object.entries(PROPERTY_ALIASES),
]);

/** Case-insensitive lookup; null for properties the engine does not track. */
export function resolveProperty(name: string): DirectoryProperty | null {
  return BY_LOWER_NAME.get(name.trim().toLowerCase()) ?? null;
}
