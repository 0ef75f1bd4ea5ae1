/**
 * Renders results as structured JSON for programmatic use.
 * Absent values are omitted rather than written as null.
 */

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
