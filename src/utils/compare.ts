/**
 * Code-unit order, the same SQLite uses for TEXT keys. Unlike
 * `localeCompare` it does not depend on the ICU locale of the machine.
 */
export function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
