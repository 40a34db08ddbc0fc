/**
 * Version constraint matching for language runtimes.
 *
 * Accepted forms: exact or prefix (`3.12`, `3.12.4`, `3.x`), comparisons
 * (`>=3.11`, `<4`, `=17`), caret and tilde ranges (`^20.1`, `~3.11`),
 * space-separated conjunctions (`>=3.10 <3.13`) and `||` alternatives.
 */

type Operator = '>=' | '>' | '<=' | '<' | '=' | '^' | '~' | '';

interface Comparator {
  operator: Operator;
  // null marks a wildcard component
  parts: (number | null)[];
}

const OPERATORS: readonly Operator[] = ['>=', '>', '<=', '<', '=', '^', '~'];

function isOperator(value: string | undefined): value is Operator {
  return OPERATORS.some(operator => operator === value);
}

const COMPARATOR = /^(>=|<=|>|<|=|\^|~)?v?((?:\d+|[xX*])(?:\.(?:\d+|[xX*]))*)$/;

function parseComparator(token: string): Comparator | null {
  const match = COMPARATOR.exec(token);
  if (!match) return null;
  const operator: Operator = isOperator(match[1]) ? match[1] : '';
  const parts = match[2].split('.').map(part => (/^\d+$/.test(part) ? Number(part) : null));
  return { operator, parts };
}

/**
 * Split an alternative into comparator tokens, joining an operator written
 * apart from its version (`>= 3.11`).
 */
function tokenize(alternative: string): string[] {
  const raw = alternative.trim().split(/\s+/).filter(token => token.length > 0);
  const tokens: string[] = [];
  for (let i = 0; i < raw.length; i++) {
    if (/^(>=|<=|>|<|=|\^|~)$/.test(raw[i]) && i + 1 < raw.length) {
      tokens.push(raw[i] + raw[i + 1]);
      i++;
    } else {
      tokens.push(raw[i]);
    }
  }
  return tokens;
}

function parseConstraint(constraint: string): Comparator[][] | null {
  const alternatives = constraint.split('||').map(tokenize);
  const parsed: Comparator[][] = [];
  for (const tokens of alternatives) {
    if (tokens.length === 0) return null;
    const comparators: Comparator[] = [];
    for (const token of tokens) {
      const comparator = parseComparator(token);
      if (!comparator) return null;
      comparators.push(comparator);
    }
    parsed.push(comparators);
  }
  return parsed;
}

export function isValidConstraint(constraint: string): boolean {
  return constraint.trim().length > 0 && parseConstraint(constraint) !== null;
}

/**
 * Leading numeric components of a runtime version: `3.12.4rc1` -> [3, 12, 4].
 */
export function parseVersion(version: string): number[] | null {
  const match = /^v?(\d+(?:\.\d+)*)/.exec(version.trim());
  return match ? match[1].split('.').map(Number) : null;
}

function compare(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

/**
 * Every concrete component of the requirement must be present in the
 * version and equal. Wildcards match anything.
 */
function prefixMatches(parts: (number | null)[], version: number[]): boolean {
  return parts.every((part, i) => part === null || version[i] === part);
}

function concreteParts(parts: (number | null)[]): number[] {
  const concrete: number[] = [];
  for (const part of parts) {
    if (part === null) break;
    concrete.push(part);
  }
  return concrete;
}

function upperBound(base: number[], operator: '^' | '~'): number[] {
  if (operator === '~') {
    // ~3.11 -> <3.12, ~3 -> <4
    return base.length >= 2 ? [base[0], base[1] + 1] : [base[0] + 1];
  }
  // ^20.1 -> <21, ^0.4 -> <0.5, ^0.0.3 -> <0.0.4
  const firstNonZero = base.findIndex(part => part !== 0);
  const index = firstNonZero === -1 ? base.length - 1 : firstNonZero;
  return [...base.slice(0, index), base[index] + 1];
}

function satisfiesComparator(comparator: Comparator, version: number[]): boolean {
  const base = concreteParts(comparator.parts);

  switch (comparator.operator) {
    case '':
    case '=':
      return prefixMatches(comparator.parts, version);
    case '>=':
      return compare(version, base) >= 0;
    case '>':
      return compare(version, base) > 0;
    case '<=':
      return compare(version, base) <= 0 || prefixMatches(comparator.parts, version);
    case '<':
      return compare(version, base) < 0;
    case '^':
    case '~':
      if (base.length === 0) return true;
      return compare(version, base) >= 0 && compare(version, upperBound(base, comparator.operator)) < 0;
  }
}

export function satisfiesVersion(constraint: string, version: string): boolean {
  if (!constraint.trim()) return true;
  const parsedVersion = parseVersion(version);
  const alternatives = parseConstraint(constraint);
  if (!parsedVersion || !alternatives) return false;
  return alternatives.some(comparators => comparators.every(comparator => satisfiesComparator(comparator, parsedVersion)));
}
