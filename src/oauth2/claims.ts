/**
 * Typed lookups of claims in a userinfo or token response.
 */

type Claims = Record<string, unknown>;

/**
 * String form of a scalar JSON value; undefined for null, objects and arrays.
 */
function scalarToString(value: unknown): string | undefined {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    default:
      return undefined;
  }
}

/**
 * Read a claim as a string.
 * Numbers and booleans are converted; missing, null, object and array values
 * are reported as absent.
 */
export function getClaimAsString(claims: Claims, name: string): string | undefined {
  if (!Object.hasOwn(claims, name)) {
    return undefined;
  }
  return scalarToString(claims[name]);
}

/**
 * Read a claim as a set of strings.
 * A missing, null or non-array claim yields an empty set. Scalar entries are
 * converted to strings. Null, object and array entries are skipped: a null
 * entry never becomes the group `"null"`.
 */
export function getClaimAsStringSet(claims: Claims, name: string): Set<string> {
  const result = new Set<string>();
  const value = Object.hasOwn(claims, name) ? claims[name] : undefined;
  if (!Array.isArray(value)) {
    return result;
  }
  for (const entry of value) {
    const text = scalarToString(entry);
    if (text !== undefined) {
      result.add(text);
    }
  }
  return result;
}
