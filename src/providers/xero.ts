import fs from 'node:fs'
import type { AccessToken, RequestToken } from '../oauth1/consumer.ts'
import {
  OAuth1Provider,
  type OAuth1ProviderOptions,
} from '../oauth1/provider.ts'
import { accessTokenExpiry, OAuth1Session } from '../oauth1/session.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const XERO_REQUEST_TOKEN_URL = 'https://api.xero.com/oauth/RequestToken'
export const XERO_AUTHORIZE_URL = 'https://api.xero.com/oauth/Authorize'
export const XERO_ACCESS_TOKEN_URL = 'https://api.xero.com/oauth/AccessToken'
export const XERO_API_URL = 'https://api.xero.com/api.xro/2.0/'

/** Xero access tokens live for 30 minutes. */
const XERO_TOKEN_LIFETIME_MS = 30 * 60 * 1000

/**
 * Xero application types: public apps sign with HMAC-SHA1, private and
 * partner apps with RSA-SHA1 and an uploaded certificate.
 */
export type XeroMethod = 'public' | 'private' | 'partner'

export interface XeroOrganisation {
  Name?: string
  LegalName?: string
  OrganisationType?: string
  CountryCode?: string
  ShortCode?: string
}

interface XeroOrganisationResponse {
  Organisations?: XeroOrganisation[]
}

export interface XeroProviderOptions extends OAuth1ProviderOptions {
  method?: XeroMethod
  /** PEM private key for private/partner apps. */
  privateKey?: string
  userAgent?: string
}

export const getXeroMethod = (): XeroMethod => {
  const method = process.env.XERO_METHOD
  return method === 'private' || method === 'partner' ? method : 'public'
}

const loadPrivateKey = (options: XeroProviderOptions): string => {
  if (options.privateKey) {
    return options.privateKey
  }
  const path = process.env.XERO_PRIVATE_KEY_PATH
  if (!path) {
    throw new Error(
      'xero private and partner apps need a privateKey or XERO_PRIVATE_KEY_PATH',
    )
  }
  return fs.readFileSync(path, 'utf-8')
}

const withDefaultExpiry = (accessToken: AccessToken): AccessToken =>
  accessToken.additionalData.oauth_expires_in
    ? accessToken
    : {
        ...accessToken,
        additionalData: {
          ...accessToken.additionalData,
          oauth_expires_in: String(XERO_TOKEN_LIFETIME_MS / 1000),
        },
      }

export class XeroProvider extends OAuth1Provider {
  readonly method: XeroMethod

  constructor(options: XeroProviderOptions) {
    const method = options.method ?? getXeroMethod()
    const userAgent = `${options.userAgent ?? process.env.XERO_USER_AGENT ?? ''} (multiauth-xero 1.0)`.trim()
    super(
      'xero',
      {
        serviceProvider: {
          requestTokenUrl: XERO_REQUEST_TOKEN_URL,
          authorizeTokenUrl: XERO_AUTHORIZE_URL,
          accessTokenUrl: XERO_ACCESS_TOKEN_URL,
        },
        signatureMethod: method === 'public' ? 'HMAC-SHA1' : 'RSA-SHA1',
        privateKey: method === 'public' ? undefined : loadPrivateKey(options),
        additionalHeaders: {
          Accept: 'application/json',
          'User-Agent': userAgent,
        },
      },
      options,
    )
    this.method = method
  }

  /** Private apps are pre-authorized; the consumer key acts as the token. */
  async exchangeVerifier(
    requestToken: RequestToken,
    verifier: string,
  ): Promise<AccessToken> {
    if (this.method === 'private') {
      return { token: this.clientKey, secret: '', additionalData: {} }
    }
    const accessToken = await super.exchangeVerifier(requestToken, verifier)
    return withDefaultExpiry(accessToken)
  }

  /**
   * Renew a partner app's access token using its session handle. Xero
   * offers no OAuth2-style refresh, so `refreshToken` stays unsupported.
   */
  async refreshOAuth1Token(session: OAuth1Session): Promise<void> {
    if (!session.accessToken) {
      throw new Error(`${this.providerName} session has no access token to refresh`)
    }
    const accessToken = await this.consumer.refreshToken(
      session.accessToken,
      this.requestContext('refresh the access token'),
    )
    session.accessToken = withDefaultExpiry(accessToken)
    session.expiresAt = accessTokenExpiry(session.accessToken)
  }

  async refreshToken(_refreshToken: string): Promise<never> {
    throw new Error(
      'Refresh token is only provided by Xero for Partner Applications; use refreshOAuth1Token',
    )
  }

  protected async fetchProfile(accessToken: AccessToken): Promise<UserFields> {
    const response = await this.signedGetJson<XeroOrganisationResponse>(
      `${XERO_API_URL}Organisation`,
      {},
      accessToken,
    )
    const organisation = response.Organisations?.[0]
    if (!organisation) {
      throw new Error(`${this.providerName} returned no organisation`)
    }

    return {
      rawData: toRawData(organisation),
      userId: organisation.ShortCode ?? '',
      name: organisation.Name ?? '',
      nickName: organisation.LegalName ?? '',
      description: organisation.OrganisationType ?? '',
      location: organisation.CountryCode ?? '',
    }
  }
}
