/** Copy a decoded profile payload into `User.rawData`. */
export const toRawData = (value: object): Record<string, unknown> =>
  Object.fromEntries(Object.entries(value))

/** Provider ids arrive as strings or numbers; absent ids become ''. */
export const idString = (value: string | number | undefined | null): string =>
  value === undefined || value === null ? '' : String(value)

/** Join name parts, skipping empty ones. */
export const joinName = (...parts: Array<string | undefined>): string =>
  parts.filter((part) => part !== undefined && part !== '').join(' ')
