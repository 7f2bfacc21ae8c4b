/**
 * JSON Canonicalization Scheme (RFC 8785)
 *
 * Signed decryption responses are compared byte for byte, so both the
 * oracle and the verifier serialize through this one function: object keys
 * sorted by UTF-16 code unit, no whitespace, ECMAScript number formatting.
 */

function canonicalNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error('Cannot canonicalize non-finite number');
  }
  // JSON.stringify(-0) is already "0"; integers past 1e21 keep exponent form
  return JSON.stringify(value);
}

function canonicalObject(value: object): string {
  const members = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalize(member)}`);
  return `{${members.join(',')}}`;
}

export function canonicalize(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return canonicalNumber(value);
    case 'string':
      return JSON.stringify(value);
    case 'object':
      return Array.isArray(value)
        ? `[${value.map((item) => canonicalize(item)).join(',')}]`
        : canonicalObject(value);
    default:
      throw new Error(`Cannot canonicalize type: ${typeof value}`);
  }
}

/**
 * Canonical form encoded as UTF-8
 */
export function canonicalizeBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalize(value));
}
