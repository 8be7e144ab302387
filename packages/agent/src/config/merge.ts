/**
 * Merge a configuration document over its defaults.
 *
 *  - objects merge key by key, the overriding side wins
 *  - lists of `[name, ...]` entries keep every overriding entry and add the
 *    default entries whose name is not already present, so a config file
 *    can change the interval of one metric without repeating the rest
 *  - anything else: the overriding value wins
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function entryName(value: unknown): unknown {
  return Array.isArray(value) && value.length > 0 ? value[0] : undefined;
}

export function mergeConfigs(overrides: unknown, defaults: unknown): unknown {
  if (isPlainObject(overrides) && isPlainObject(defaults)) {
    const merged: Record<string, unknown> = { ...overrides };
    for (const [key, value] of Object.entries(defaults)) {
      merged[key] = key in overrides ? mergeConfigs(overrides[key], value) : value;
    }
    return merged;
  }

  if (Array.isArray(overrides) && Array.isArray(defaults)) {
    const names = new Set(overrides.map(entryName).filter((n) => n !== undefined));
    const merged: unknown[] = [...overrides];
    for (const entry of defaults) {
      const name = entryName(entry);
      if (name === undefined || !names.has(name)) merged.push(entry);
    }
    return merged;
  }

  return overrides;
}
