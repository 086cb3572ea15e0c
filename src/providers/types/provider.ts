import type { Token } from '../../oauth2/token.ts'
import type { User } from './user.ts'

/** Read-only view over callback parameters; URLSearchParams satisfies it. */
export interface Params {
  get(name: string): string | null
}

/**
 * State of one authentication attempt. Created by `Provider.beginAuth`,
 * persisted between the redirect and the callback via `marshal`.
 */
export interface Session {
  getAuthUrl(): string
  authorize(provider: Provider, params: Params): Promise<string>
  marshal(): string
}

/**
 * Adapter for one external identity service.
 */
export interface Provider {
  name(): string
  setName(name: string): void
  beginAuth(state: string): Promise<Session>
  unmarshalSession(data: string): Session
  fetchUser(session: Session): Promise<User>
  debug(enabled: boolean): void
  refreshTokenAvailable(): boolean
  refreshToken(refreshToken: string): Promise<Token>
}

export const NO_AUTH_URL_ERROR_MESSAGE = 'an AuthURL has not been set'
