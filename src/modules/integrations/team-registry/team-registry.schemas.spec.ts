import { optionalDate, teamWithMembersSchema } from './team-registry.schemas';

describe('team registry schemas', () => {
  it.each([
    ['2024-02-05', '2024-02-05'],
    ['2024-02-05T08:30:00Z', '2024-02-05'],
    ['', null],
    [null, null],
    [undefined, null],
  ])('should read the date %p as %p', (raw, expected) => {
    expect(optionalDate.parse(raw)).toBe(expected);
  });

  it('should reject a date that is not ISO', () => {
    expect(optionalDate.safeParse('05/02/2024').success).toBe(false);
  });

  it('should normalise a registry team', () => {
    expect(
      teamWithMembersSchema.parse({
        teamId: '501',
        name: 'North Ridge',
        teamType: 'vtm',
        effectiveEndDate: '',
        members: [{ employeeId: 100003, role: 'lead', effectiveStartDate: '2023-01-09' }],
      }),
    ).toEqual({
      teamId: 501,
      name: 'North Ridge',
      teamType: 'VTM',
      effectiveEndDate: null,
      members: [{ employeeId: '100003', role: 'LEAD', effectiveStartDate: '2023-01-09', effectiveEndDate: null }],
    });
  });

  it('should default an absent member list to empty', () => {
    expect(teamWithMembersSchema.parse({ teamId: 7, name: 'Solo', teamType: 'HTM' }).members).toEqual([]);
  });
});
