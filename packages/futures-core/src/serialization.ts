function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON with object keys sorted at every depth and undefined members dropped.
 * Two payloads that differ only in key order serialize identically.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (!isObject(value) && !Array.isArray(value)) return JSON.stringify(value);

  const encode = (input: unknown): unknown => {
    if (Array.isArray(input)) return input.map((item) => encode(item));
    if (isObject(input)) {
      const out: Record<string, unknown> = {};
      for (const key of Object.keys(input).sort()) {
        const val = input[key];
        if (val === undefined) continue;
        out[key] = encode(val);
      }
      return out;
    }
    return input;
  };

  return JSON.stringify(encode(value));
}
