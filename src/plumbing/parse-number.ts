/**
 * Number from an environment value; `fallback` when the value is unset,
 * blank or not a finite number.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  const trimmed = value?.trim()
  if (!trimmed) {
    return fallback
  }
  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : fallback
}
