/**
 * Deterministic JSON formatting utilities
 */

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 *
 * Object keys are sorted by UTF-16 code unit so the output does not depend on
 * the host locale; arrays keep their order.
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2, 0 for compact)
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(obj: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const normalize = (value: unknown): unknown => {
    if (value && typeof value === "object") {
      // Detect cycles
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        const entries: Array<[string, unknown]> = Object.entries(value);
        entries.sort(([a], [b]) => compareCodeUnits(a, b));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}

/**
 * Locale-independent string ordering
 */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
