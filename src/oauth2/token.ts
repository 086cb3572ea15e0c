export interface Token {
  accessToken: string
  tokenType: string
  refreshToken: string
  expiry?: Date
  /** Every field of the token response, e.g. id_token or provider extras. */
  raw: Record<string, unknown>
}

/** Allowance for clock drift when judging expiry. */
const EXPIRY_DELTA_MS = 10 * 1000

export const isTokenValid = (token: Token, now: Date = new Date()): boolean => {
  if (!token.accessToken) {
    return false
  }
  if (!token.expiry) {
    return true
  }
  return token.expiry.getTime() - EXPIRY_DELTA_MS > now.getTime()
}

/** Read a string extra from the token response, or '' when absent. */
export const getTokenExtra = (token: Token, key: string): string => {
  const value = token.raw[key]
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return ''
}
