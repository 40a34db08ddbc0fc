import { isValidConstraint, parseVersion, satisfiesVersion } from '../version-match';

describe('satisfiesVersion', () => {
  it.each([
    ['3.12', '3.12.4', true],
    ['3.12', '3.13.0', false],
    ['3.12.4', '3.12', false],
    ['3.x', '3.9.1', true],
    ['=17', '17.0.9', true],
    ['>=3.11', '3.12.4', true],
    ['>= 3.11', '3.11.0', true],
    ['>3.11', '3.11.0', false],
    ['<=3.12', '3.12.4', true],
    ['<3.12', '3.11.9', true],
    ['>=3.10 <3.12', '3.12.1', false],
    ['^20.1', '20.11.0', true],
    ['^20.1', '21.0.0', false],
    ['~3.11', '3.11.9', true],
    ['~3.11', '3.12.0', false],
    ['<3.10 || >=3.12', '3.12.0', true],
    ['<3.10 || >=3.12', '3.11.2', false],
  ])('%s against %s should be %s', (constraint, version, expected) => {
    expect(satisfiesVersion(constraint, version)).toBe(expected);
  });

  it('should accept anything for an empty constraint', () => {
    expect(satisfiesVersion('  ', '1.0')).toBe(true);
  });

  it('should reject versions that do not start with a number', () => {
    expect(satisfiesVersion('>=1', 'latest')).toBe(false);
  });
});

describe('isValidConstraint', () => {
  it('should accept supported forms', () => {
    expect(isValidConstraint('>=3.10 <3.13 || 2.7')).toBe(true);
  });

  it('should reject unknown syntax', () => {
    expect(isValidConstraint('banana')).toBe(false);
    expect(isValidConstraint('>=')).toBe(false);
    expect(isValidConstraint('')).toBe(false);
  });
});

describe('parseVersion', () => {
  it('should keep the leading numeric components', () => {
    expect(parseVersion('3.12.4rc1')).toEqual([3, 12, 4]);
    expect(parseVersion('v20.11.0')).toEqual([20, 11, 0]);
  });
});
