/**
 * Shared enumeration utilities.
 * Used by: brute-force satisfiability checks.
 */

/**
 * Generate all mappings from keys to domain values.
 * The first key varies slowest.
 */
export function* allMappings<K, V>(
    keys: readonly K[],
    domain: readonly V[]
): Generator<Map<K, V>> {
    if (keys.length === 0) { yield new Map(); return; }
    const [first, ...rest] = keys;
    for (const v of domain) {
        for (const m of allMappings(rest, domain)) {
            yield new Map<K, V>([[first, v], ...m]);
        }
    }
}

/**
 * Generate all 2^n truth assignments over the given variable names,
 * starting from all-false.
 */
export function* allAssignments(names: readonly string[]): Generator<Map<string, boolean>> {
    yield* allMappings(names, [false, true]);
}
