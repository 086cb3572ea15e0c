/**
 * Helpers for restoring marshaled sessions. Sessions are stored as JSON
 * objects; unknown or mistyped fields read as empty.
 */
export const parseSessionData = (data: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(data)
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('session data must be a JSON object')
  }
  return Object.fromEntries(Object.entries(parsed))
}

export const readString = (
  data: Record<string, unknown>,
  key: string,
): string => {
  const value = data[key]
  return typeof value === 'string' ? value : ''
}

export const readDate = (
  data: Record<string, unknown>,
  key: string,
): Date | undefined => {
  const value = data[key]
  if (typeof value !== 'string' || value === '') {
    return undefined
  }
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? undefined : date
}

export const readStringRecord = (
  data: Record<string, unknown>,
  key: string,
): Record<string, string> => {
  const value = data[key]
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return {}
  }
  const result: Record<string, string> = {}
  for (const [entryKey, entryValue] of Object.entries(value)) {
    if (typeof entryValue === 'string') {
      result[entryKey] = entryValue
    }
  }
  return result
}
