export type PlainObject = Record<string, unknown>;

export function isPlainObject(item: unknown): item is PlainObject {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}

/**
 * Merge `sources` into a copy of `target`, left to right
 *
 * Nested objects merge key by key; arrays and scalars replace. `undefined`
 * in a source never overwrites, so optional CLI flags can be passed as-is.
 */
export function deepMerge(target: PlainObject, ...sources: Array<PlainObject | undefined>): PlainObject {
  const result: PlainObject = { ...target };

  for (const source of sources) {
    if (!source) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
    }
  }

  return result;
}
