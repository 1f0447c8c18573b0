import { PROPERTY_RULES, resolveProperty } from './directory-property-table';

describe('resolveProperty', () => {
  it('should resolve property names case-insensitively', () => {
    expect(resolveProperty('DistinguishedName')).toBe('distinguishedName');
    expect(resolveProperty(' COUNTRY ')).toBe('country');
  });

  it('should map directory attribute aliases onto tracked properties', () => {
    expect(resolveProperty('ej-IRNumber')).toBe('employeeId');
    expect(resolveProperty('State')).toBe('country');
    expect(resolveProperty('NAME')).toBe('name');
  });

  it('should return null for untracked properties', () => {
    expect(resolveProperty('mail')).toBeNull();
  });
});

describe('PROPERTY_RULES', () => {
  it('should resolve a manager reference to a username', () => {
    expect(PROPERTY_RULES.manager.apply('CN=p100003,OU=Branch,DC=example,DC=test')).toEqual({ managerUsername: 'p100003' });
    expect(PROPERTY_RULES.manager.apply('')).toEqual({ managerUsername: null });
  });

  it('should read the enabled flag', () => {
    expect(PROPERTY_RULES.enabled.apply(' TRUE ')).toEqual({ active: true });
    expect(PROPERTY_RULES.enabled.apply('no')).toEqual({ active: false });
    expect(PROPERTY_RULES.enabled.apply(null)).toEqual({ active: false });
  });

  it('should uppercase countries and blank out empty text', () => {
    expect(PROPERTY_RULES.country.apply(' ca ')).toEqual({ country: 'CA' });
    expect(PROPERTY_RULES.country.apply('')).toEqual({ country: null });
    expect(PROPERTY_RULES.title.apply('   ')).toEqual({ title: null });
  });

  it('should recognise a name change without touching the user', () => {
    expect(PROPERTY_RULES.name.apply('Nora Hale-Park')).toEqual({});
    expect(PROPERTY_RULES.name.impactful).toBe(false);
  });

  it('should mark only placement properties as impactful', () => {
    const impactful = Object.entries(PROPERTY_RULES)
      .filter(([, rule]) => rule.impactful)
      .map(([name]) => name);

    expect(impactful).toEqual(['title', 'distinguishedName', 'country']);
  });
});
