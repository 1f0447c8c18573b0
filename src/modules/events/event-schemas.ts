/**
 * Inbound change-event payloads.
 *
 * Producers disagree on key spelling, so keys are matched case-insensitively
 * and a few legacy names are aliased before validation. Anything that still
 * fails validation is a poison message.
 */
import { z, ZodError } from 'zod';

import { PoisonMessageError } from '../../domain/errors';
import { optionalDate } from '../integrations/team-registry/team-registry.schemas';

type KeyMap = Readonly<Record<string, string>>;

const DIRECTORY_KEYS: KeyMap = {
  username: 'username',
  samaccountname: 'username',
  changetype: 'changeType',
  property: 'property',
  oldvalue: 'oldValue',
  beforevalue: 'oldValue',
  newvalue: 'newValue',
};

const TEAM_KEYS: KeyMap = {
  teamid: 'teamId',
  registryteamid: 'teamId',
  teamtype: 'teamType',
  teamname: 'teamName',
  name: 'teamName',
  effectivebegindate: 'effectiveBeginDate',
  effectiveenddate: 'effectiveEndDate',
  members: 'members',
};

const MEMBER_KEYS: KeyMap = {
  employeeid: 'employeeId',
  role: 'role',
  effectivestartdate: 'effectiveStartDate',
  effectivebegindate: 'effectiveStartDate',
  effectiveenddate: 'effectiveEndDate',
  active: 'active',
};

/** Rename known keys to their canonical spelling; unknown keys are dropped. */
export function normalizeKeys(value: unknown, keys: KeyMap): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const canonical = keys[key.toLowerCase()];
    if (canonical !== undefined && out[canonical] === undefined) out[canonical] = entry;
  }
  return out;
}

const scalarText = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? null : String(v)));

export const DIRECTORY_CHANGE_TYPES = ['TerminatedUser', 'DataChange', 'NewUser'] as const;

export type DirectoryChangeType = (typeof DIRECTORY_CHANGE_TYPES)[number];

const changeType = z
  .string()
  .transform((value) => DIRECTORY_CHANGE_TYPES.find((t) => t.toLowerCase() === value.trim().toLowerCase()))
  .pipe(z.enum(DIRECTORY_CHANGE_TYPES, { errorMap: () => ({ message: `expected one of ${DIRECTORY_CHANGE_TYPES.join(', ')}` }) }));

export const directoryChangeEventSchema = z.preprocess(
  (raw) => normalizeKeys(raw, DIRECTORY_KEYS),
  z
    .object({
      username: z.string().trim().min(1),
      changeType,
      property: z.string().trim().min(1).nullish().transform((v) => v ?? null),
      oldValue: scalarText,
      newValue: scalarText,
    })
    .refine((e) => e.changeType !== 'DataChange' || e.property !== null, {
      message: 'DataChange requires a property',
      path: ['property'],
    }),
);

export type DirectoryChangeEvent = z.infer<typeof directoryChangeEventSchema>;

const teamId = z.union([
  z.number().int().positive(),
  z.string().trim().regex(/^\d+$/, 'expected a numeric team id').transform(Number),
]);

export const teamMemberDeltaSchema = z.preprocess(
  (raw) => normalizeKeys(raw, MEMBER_KEYS),
  z.object({
    employeeId: z.union([z.string().trim().min(1), z.number().int().transform(String)]),
    role: z.string().nullish().transform((r) => (r ? r.toUpperCase() : null)),
    effectiveStartDate: optionalDate,
    effectiveEndDate: optionalDate,
    active: z.boolean().default(true),
  }),
);

export type TeamMemberDelta = z.infer<typeof teamMemberDeltaSchema>;

export const teamChangeEventSchema = z.preprocess(
  (raw) => normalizeKeys(raw, TEAM_KEYS),
  z.object({
    teamId,
    teamType: z.string().trim().min(1).transform((t) => t.toUpperCase()),
    teamName: z.string().trim().min(1).nullish().transform((v) => v ?? null),
    effectiveBeginDate: optionalDate,
    effectiveEndDate: optionalDate,
    members: z.array(teamMemberDeltaSchema).nullish().transform((m) => m ?? []),
  }),
);

export type TeamChangeEvent = z.infer<typeof teamChangeEventSchema>;

export function parseDirectoryEvent(raw: unknown): DirectoryChangeEvent {
  return parseOrPoison(directoryChangeEventSchema, raw, 'directory');
}

export function parseTeamEvent(raw: unknown): TeamChangeEvent {
  return parseOrPoison(teamChangeEventSchema, raw, 'team');
}

function parseOrPoison<T extends z.ZodTypeAny>(schema: T, raw: unknown, kind: string): z.infer<T> {
  try {
    return schema.parse(raw);
  } catch (error: unknown) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new PoisonMessageError(`Malformed ${kind} event`, issues);
    }
    throw error;
  }
}
