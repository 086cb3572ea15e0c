import type { Token } from '../oauth2/token.ts'
import { parseSessionData, readString } from './session-data.ts'
import type { Params, Provider, Session } from './types/provider.ts'
import { createUser, type User } from './types/user.ts'

export const FAUX_AUTH_URL = 'http://example.com/auth/'

/**
 * In-memory provider for tests: no network, the user is whatever the
 * session carries.
 */
export class FauxSession implements Session {
  name: string
  email: string
  accessToken: string

  constructor(data: { name?: string; email?: string; accessToken?: string } = {}) {
    this.name = data.name ?? ''
    this.email = data.email ?? ''
    this.accessToken = data.accessToken ?? ''
  }

  getAuthUrl(): string {
    return FAUX_AUTH_URL
  }

  async authorize(_provider: Provider, params: Params): Promise<string> {
    this.accessToken = params.get('code') ?? 'faux-token'
    return this.accessToken
  }

  marshal(): string {
    return JSON.stringify(this)
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, email: this.email, accessToken: this.accessToken }
  }
}

export class FauxProvider implements Provider {
  private providerName = 'faux'

  name(): string {
    return this.providerName
  }

  setName(name: string): void {
    this.providerName = name
  }

  debug(_enabled: boolean): void {}

  async beginAuth(_state: string): Promise<Session> {
    return new FauxSession()
  }

  unmarshalSession(data: string): Session {
    const parsed = parseSessionData(data)
    return new FauxSession({
      name: readString(parsed, 'name'),
      email: readString(parsed, 'email'),
      accessToken: readString(parsed, 'accessToken'),
    })
  }

  async fetchUser(session: Session): Promise<User> {
    if (!(session instanceof FauxSession)) {
      throw new Error(
        `${this.providerName} cannot use a session created by another provider type`,
      )
    }
    return createUser(this.providerName, {
      name: session.name,
      email: session.email,
      accessToken: session.accessToken,
    })
  }

  refreshTokenAvailable(): boolean {
    return false
  }

  async refreshToken(_refreshToken: string): Promise<Token> {
    throw new Error(`Refresh token is not provided by ${this.providerName}`)
  }
}
