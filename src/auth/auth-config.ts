import { parseNumber } from '../plumbing/parse-number.ts'

export type SessionStoreKind = 'cookie' | 'cassandra'

export interface AuthConfig {
  sessionSecret: string
  sessionName: string
  maxAgeSeconds: number
  store: SessionStoreKind
}

const DEFAULT_SESSION_NAME = '_auth_session'
const DEFAULT_MAX_AGE_SECONDS = 600
const TEST_SESSION_SECRET = 'test-session-secret'

export const getAuthConfig = (): AuthConfig => {
  let sessionSecret = process.env.AUTH_SESSION_SECRET?.trim() ?? ''
  if (!sessionSecret) {
    if (process.env.NODE_ENV !== 'test') {
      throw new Error('AUTH_SESSION_SECRET must be set to sign session cookies')
    }
    sessionSecret = TEST_SESSION_SECRET
  }

  return {
    sessionSecret,
    sessionName: process.env.AUTH_SESSION_NAME?.trim() || DEFAULT_SESSION_NAME,
    maxAgeSeconds: parseNumber(
      process.env.AUTH_SESSION_MAX_AGE_SECONDS,
      DEFAULT_MAX_AGE_SECONDS,
    ),
    store: process.env.AUTH_SESSION_STORE === 'cassandra' ? 'cassandra' : 'cookie',
  }
}
