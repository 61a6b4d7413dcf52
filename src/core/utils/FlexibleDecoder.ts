import { z } from 'zod';

/**
 * Some identifiers come back from the API either as a JSON string, a number,
 * or a list of strings. Each shape is tried in turn; anything else is `unknown`.
 */
export type FlexibleValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'list'; value: string[] }
  | { kind: 'unknown' };

const stringBranch = z.string();
const numberBranch = z.number().finite();
const listBranch = z.array(z.unknown());

export function classifyFlexible(raw: unknown): FlexibleValue {
  const asString = stringBranch.safeParse(raw);
  if (asString.success) {
    return { kind: 'string', value: asString.data };
  }

  const asNumber = numberBranch.safeParse(raw);
  if (asNumber.success) {
    return { kind: 'number', value: asNumber.data };
  }

  const asList = listBranch.safeParse(raw);
  if (asList.success) {
    // éléments non textuels ignorés
    return { kind: 'list', value: asList.data.filter((item): item is string => typeof item === 'string') };
  }

  return { kind: 'unknown' };
}

/** String or number to string; anything else gives `''`. */
export function flexibleString(raw: unknown): string {
  const decoded = classifyFlexible(raw);
  switch (decoded.kind) {
    case 'string':
      return decoded.value;
    case 'number':
      return String(decoded.value);
    default:
      return '';
  }
}

/** String to a one-element list, list of strings kept as is; anything else gives `[]`. */
export function flexibleStringList(raw: unknown): string[] {
  const decoded = classifyFlexible(raw);
  switch (decoded.kind) {
    case 'string':
      return [decoded.value];
    case 'list':
      return decoded.value;
    default:
      return [];
  }
}

export const flexibleStringSchema = z.unknown().transform(flexibleString);
export const flexibleStringListSchema = z.unknown().transform(flexibleStringList);

/**
 * Removes `null` object members at every depth so that optional fields sent
 * as `null` decode as absent. Array elements are left as they are.
 */
export function dropNulls(raw: unknown): unknown {
  if (Array.isArray(raw)) {
    return raw.map((item: unknown) => (item === null ? item : dropNulls(item)));
  }
  if (raw !== null && typeof raw === 'object') {
    return Object.fromEntries(
      Object.entries(raw)
        .filter(([, value]) => value !== null)
        .map(([key, value]) => [key, dropNulls(value)]),
    );
  }
  return raw;
}
