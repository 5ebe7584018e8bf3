/**
 * Read an integer from a route param or query value.
 * Request schemas have already validated the raw value.
 */
export function toInt(value: unknown, fallback: number): number {
  if (typeof value !== 'string' || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

export function toText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}
