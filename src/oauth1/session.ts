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
import type { AccessToken, RequestToken } from './consumer.ts'

/**
 * Implemented by providers able to trade a verifier for an access token.
 */
export interface VerifierExchanger {
  exchangeVerifier(
    requestToken: RequestToken,
    verifier: string,
  ): Promise<AccessToken>
}

const isVerifierExchanger = (
  provider: Provider,
): provider is Provider & VerifierExchanger =>
  'exchangeVerifier' in provider &&
  typeof provider.exchangeVerifier === 'function'

export interface OAuth1SessionData {
  authUrl?: string
  requestToken?: RequestToken
  accessToken?: AccessToken
  expiresAt?: Date
}

/** Expiry announced through the `oauth_expires_in` extension, if any. */
export const accessTokenExpiry = (
  accessToken: AccessToken,
  now: Date = new Date(),
): Date | undefined => {
  const seconds = Number(accessToken.additionalData.oauth_expires_in)
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return undefined
  }
  return new Date(now.getTime() + seconds * 1000)
}

const readToken = (
  data: Record<string, unknown>,
  key: string,
): Record<string, unknown> | undefined => {
  const value = data[key]
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return undefined
  }
  return Object.fromEntries(Object.entries(value))
}

export class OAuth1Session implements Session {
  authUrl: string
  requestToken?: RequestToken
  accessToken?: AccessToken
  expiresAt?: Date

  constructor(data: OAuth1SessionData = {}) {
    this.authUrl = data.authUrl ?? ''
    this.requestToken = data.requestToken
    this.accessToken = data.accessToken
    this.expiresAt = data.expiresAt
  }

  static fromJSON(data: string): OAuth1Session {
    const parsed = parseSessionData(data)
    const requestToken = readToken(parsed, 'requestToken')
    const accessToken = readToken(parsed, 'accessToken')
    return new OAuth1Session({
      authUrl: readString(parsed, 'authUrl'),
      requestToken: requestToken && {
        token: readString(requestToken, 'token'),
        secret: readString(requestToken, 'secret'),
      },
      accessToken: accessToken && {
        token: readString(accessToken, 'token'),
        secret: readString(accessToken, 'secret'),
        additionalData: readStringRecord(accessToken, 'additionalData'),
      },
      expiresAt: readDate(parsed, 'expiresAt'),
    })
  }

  getAuthUrl(): string {
    if (!this.authUrl) {
      throw new Error(NO_AUTH_URL_ERROR_MESSAGE)
    }
    return this.authUrl
  }

  async authorize(provider: Provider, params: Params): Promise<string> {
    if (!isVerifierExchanger(provider)) {
      throw new Error(`${provider.name()} cannot authorize an OAuth1 session`)
    }
    if (!this.requestToken) {
      throw new Error(`${provider.name()} session has no request token`)
    }

    this.accessToken = await provider.exchangeVerifier(
      this.requestToken,
      params.get('oauth_verifier') ?? '',
    )
    this.expiresAt = accessTokenExpiry(this.accessToken)
    return this.accessToken.token
  }

  marshal(): string {
    return JSON.stringify(this)
  }

  toJSON(): Record<string, unknown> {
    return {
      authUrl: this.authUrl,
      requestToken: this.requestToken ?? null,
      accessToken: this.accessToken ?? null,
      expiresAt: this.expiresAt?.toISOString() ?? null,
    }
  }
}
