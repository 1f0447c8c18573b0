import { z } from 'zod';
import type { UserRecord } from '../../../domain/models/user.model';

/** Shape of a user as the directory exports it. */
export const directoryUserSchema = z.object({
  username: z.string().min(1),
  employeeId: z.string().nullish(),
  firstName: z.string().default(''),
  lastName: z.string().default(''),
  title: z.string().nullish(),
  distinguishedName: z.string().nullish(),
  country: z.string().nullish(),
  /** Manager DN ("CN=p100001,OU=...") or bare username. */
  manager: z.string().nullish(),
  enabled: z.boolean().default(true),
});

export type DirectoryUserDto = z.infer<typeof directoryUserSchema>;

const CN_PATTERN = /^\s*CN=([^,]+)/i;

/**
 * Extract a username from a manager reference. Accepts a DN whose first RDN
 * is the username or a bare username; returns null for empty input.
 */
export function usernameFromReference(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') return null;
  const match = CN_PATTERN.exec(trimmed);
  if (match) return match[1].trim();
  return trimmed.includes('=') ? null : trimmed;
}

export function toUserRecord(dto: DirectoryUserDto): UserRecord {
  return {
    username: dto.username,
    employeeId: dto.employeeId ?? null,
    firstName: dto.firstName,
    lastName: dto.lastName,
    title: dto.title ?? null,
    distinguishedName: dto.distinguishedName ?? null,
    country: dto.country?.toUpperCase() ?? null,
    managerUsername: usernameFromReference(dto.manager),
    active: dto.enabled,
  };
}
