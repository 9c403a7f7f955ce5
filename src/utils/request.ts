/**
 * Pick the named string fields out of a JSON body. Returns null when any is
 * missing, empty or not a string.
 */
export function pickStrings<K extends string>(body: unknown, keys: readonly K[]): Record<K, string> | null {
  if (body === null || typeof body !== 'object') return null;

  const picked: Record<string, string> = {};
  for (const key of keys) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value !== 'string' || value.trim() === '') return null;
    picked[key] = value.trim();
  }
  return isComplete(picked, keys) ? picked : null;
}

export function pickBoolean(body: unknown, key: string): boolean | null {
  if (body === null || typeof body !== 'object') return null;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'boolean' ? value : null;
}

/**
 * Parse a route parameter as a positive integer id.
 */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function isComplete<K extends string>(
  picked: Record<string, string>,
  keys: readonly K[]
): picked is Record<string, string> & Record<K, string> {
  return keys.every((key) => typeof picked[key] === 'string');
}
