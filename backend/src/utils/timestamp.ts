/**
 * UTC timestamp without zone suffix, padded to microsecond precision:
 * `2024-01-01T00:00:00.000000`.
 */
export function formatTimestamp(date: Date): string {
    return `${date.toISOString().slice(0, -1)}000`;
}
