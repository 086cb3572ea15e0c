import {
  NO_AUTH_URL_ERROR_MESSAGE,
  type Params,
  type Provider,
  type Session,
} from '../providers/types/provider.ts'
import {
  parseSessionData,
  readDate,
  readString,
  readStringRecord,
} from '../providers/session-data.ts'
import { getTokenExtra, isTokenValid, type Token } from './token.ts'

export interface OAuth2SessionData {
  authUrl?: string
  accessToken?: string
  refreshToken?: string
  expiresAt?: Date
  idToken?: string
  codeVerifier?: string
  extra?: Record<string, string>
}

/**
 * Implemented by providers able to turn callback params into a token.
 */
export interface CodeExchanger {
  exchangeCode(session: OAuth2Session, params: Params): Promise<Token>
  /** Token response fields kept on the session after the exchange. */
  tokenExtraKeys?: readonly string[]
}

const isCodeExchanger = (
  provider: Provider,
): provider is Provider & CodeExchanger =>
  'exchangeCode' in provider && typeof provider.exchangeCode === 'function'

/**
 * Session for OAuth2 authorization-code providers.
 */
export class OAuth2Session implements Session {
  authUrl: string
  accessToken: string
  refreshToken: string
  expiresAt?: Date
  idToken: string
  codeVerifier: string
  extra: Record<string, string>

  constructor(data: OAuth2SessionData = {}) {
    this.authUrl = data.authUrl ?? ''
    this.accessToken = data.accessToken ?? ''
    this.refreshToken = data.refreshToken ?? ''
    this.expiresAt = data.expiresAt
    this.idToken = data.idToken ?? ''
    this.codeVerifier = data.codeVerifier ?? ''
    this.extra = data.extra ?? {}
  }

  static fromJSON(data: string): OAuth2Session {
    const parsed = parseSessionData(data)
    return new OAuth2Session({
      authUrl: readString(parsed, 'authUrl'),
      accessToken: readString(parsed, 'accessToken'),
      refreshToken: readString(parsed, 'refreshToken'),
      expiresAt: readDate(parsed, 'expiresAt'),
      idToken: readString(parsed, 'idToken'),
      codeVerifier: readString(parsed, 'codeVerifier'),
      extra: readStringRecord(parsed, 'extra'),
    })
  }

  getAuthUrl(): string {
    if (!this.authUrl) {
      throw new Error(NO_AUTH_URL_ERROR_MESSAGE)
    }
    return this.authUrl
  }

  async authorize(provider: Provider, params: Params): Promise<string> {
    if (!isCodeExchanger(provider)) {
      throw new Error(
        `${provider.name()} cannot authorize an OAuth2 session`,
      )
    }

    const token = await provider.exchangeCode(this, params)
    if (!isTokenValid(token)) {
      throw new Error('Invalid token received from provider')
    }

    this.accessToken = token.accessToken
    this.refreshToken = token.refreshToken
    this.expiresAt = token.expiry
    this.idToken = getTokenExtra(token, 'id_token')
    for (const key of provider.tokenExtraKeys ?? []) {
      const value = getTokenExtra(token, key)
      if (value) {
        this.extra[key] = value
      }
    }
    return token.accessToken
  }

  marshal(): string {
    return JSON.stringify(this)
  }

  toJSON(): Record<string, unknown> {
    return {
      authUrl: this.authUrl,
      accessToken: this.accessToken,
      refreshToken: this.refreshToken,
      expiresAt: this.expiresAt?.toISOString() ?? null,
      idToken: this.idToken,
      codeVerifier: this.codeVerifier,
      extra: this.extra,
    }
  }
}
