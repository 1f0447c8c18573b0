import { z } from 'zod';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}/, 'expected an ISO date')
  .transform((value) => value.slice(0, 10));

/** Registry dates are optional; an empty string means "no date". */
export const optionalDate = z
  .union([isoDate, z.literal(''), z.null(), z.undefined()])
  .transform((value) => (value ? value : null));

export const teamSummarySchema = z.object({
  teamId: z.coerce.number().int(),
  name: z.string().min(1),
  teamType: z.string().min(1).transform((t) => t.toUpperCase()),
});

export const teamMemberSchema = z.object({
  employeeId: z.union([z.string().min(1), z.number().int().transform(String)]),
  role: z.string().nullish().transform((r) => (r ? r.toUpperCase() : null)),
  effectiveStartDate: optionalDate,
  effectiveEndDate: optionalDate,
});

export const teamWithMembersSchema = teamSummarySchema.extend({
  effectiveEndDate: optionalDate,
  members: z.array(teamMemberSchema).default([]),
});
