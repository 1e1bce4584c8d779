/**
 * Read a property from an untrusted value (parsed JSON, request bodies).
 * Returns undefined when the value is not an object or lacks the key.
 */
export function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  return Object.entries(value).find(([k]) => k === key)?.[1];
}

/** Like readField, but only yields strings. */
export function readString(value: unknown, key: string): string | undefined {
  const field = readField(value, key);
  return typeof field === "string" ? field : undefined;
}
