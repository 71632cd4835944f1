/**
 * ISO-8601 UTC timestamp at second precision, e.g. `2024-05-01T08:00:00Z`.
 */
export function isoSeconds(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
