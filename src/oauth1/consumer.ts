import crypto from 'node:crypto'
import { type RequestContext, sendRequest } from '../plumbing/http.ts'
import {
  percentEncode,
  type SignatureMethod,
  sign,
  signatureBaseString,
} from './signature.ts'

export interface ServiceProvider {
  requestTokenUrl: string
  authorizeTokenUrl: string
  accessTokenUrl: string
}

export interface RequestToken {
  token: string
  secret: string
}

export interface AccessToken {
  token: string
  secret: string
  /** Remaining response fields, e.g. oauth_expires_in or oauth_session_handle. */
  additionalData: Record<string, string>
}

export interface ConsumerOptions {
  consumerKey: string
  consumerSecret: string
  serviceProvider: ServiceProvider
  signatureMethod?: SignatureMethod
  privateKey?: crypto.KeyObject | string
  additionalHeaders?: Record<string, string>
  /** Appended to the authorize URL next to oauth_token. */
  additionalAuthorizationUrlParams?: Record<string, string>
  nonce?: () => string
  now?: () => Date
}

const parseForm = (text: string): Record<string, string> =>
  Object.fromEntries(new URLSearchParams(text))

/**
 * OAuth 1.0a consumer: request token, user authorization, access token and
 * signed resource requests.
 */
export class Consumer {
  readonly consumerKey: string
  readonly serviceProvider: ServiceProvider
  readonly signatureMethod: SignatureMethod
  additionalHeaders: Record<string, string>
  additionalAuthorizationUrlParams: Record<string, string>

  private readonly consumerSecret: string
  private readonly privateKey?: crypto.KeyObject | string
  private readonly nonce: () => string
  private readonly now: () => Date

  constructor(options: ConsumerOptions) {
    this.consumerKey = options.consumerKey
    this.consumerSecret = options.consumerSecret
    this.serviceProvider = options.serviceProvider
    this.signatureMethod = options.signatureMethod ?? 'HMAC-SHA1'
    this.privateKey = options.privateKey
    this.additionalHeaders = options.additionalHeaders ?? {}
    this.additionalAuthorizationUrlParams =
      options.additionalAuthorizationUrlParams ?? {}
    this.nonce = options.nonce ?? (() => crypto.randomBytes(16).toString('hex'))
    this.now = options.now ?? (() => new Date())
  }

  async getRequestTokenAndUrl(
    callbackUrl: string,
    context: RequestContext,
  ): Promise<{ requestToken: RequestToken; url: string }> {
    const data = await this.postForToken(
      this.serviceProvider.requestTokenUrl,
      [['oauth_callback', callbackUrl]],
      undefined,
      context,
    )

    if (data.oauth_callback_confirmed && data.oauth_callback_confirmed !== 'true') {
      throw new Error('oauth1: callback was not confirmed by the service provider')
    }

    const requestToken = {
      token: data.oauth_token ?? '',
      secret: data.oauth_token_secret ?? '',
    }
    if (!requestToken.token) {
      throw new Error('oauth1: request token response missing oauth_token')
    }

    const query = new URLSearchParams({
      oauth_token: requestToken.token,
      ...this.additionalAuthorizationUrlParams,
    })
    return {
      requestToken,
      url: `${this.serviceProvider.authorizeTokenUrl}?${query.toString()}`,
    }
  }

  async authorizeToken(
    requestToken: RequestToken,
    verifier: string,
    context: RequestContext,
  ): Promise<AccessToken> {
    const data = await this.postForToken(
      this.serviceProvider.accessTokenUrl,
      [['oauth_verifier', verifier]],
      requestToken,
      context,
    )
    return this.toAccessToken(data)
  }

  /**
   * Exchange an expiring access token for a new one using its session
   * handle.
   */
  async refreshToken(
    accessToken: AccessToken,
    context: RequestContext,
  ): Promise<AccessToken> {
    const sessionHandle = accessToken.additionalData.oauth_session_handle
    if (!sessionHandle) {
      throw new Error('oauth1: access token has no oauth_session_handle')
    }
    const data = await this.postForToken(
      this.serviceProvider.accessTokenUrl,
      [['oauth_session_handle', sessionHandle]],
      accessToken,
      context,
    )
    return this.toAccessToken(data)
  }

  /** Signed GET of a protected resource. */
  async get(
    url: string,
    params: Record<string, string>,
    accessToken: RequestToken,
    context: RequestContext,
  ): Promise<Response> {
    const target = new URL(url)
    for (const [key, value] of Object.entries(params)) {
      target.searchParams.set(key, value)
    }
    const authorization = this.authorizationHeader(
      'GET',
      target.toString(),
      [],
      accessToken,
    )
    return sendRequest(
      target,
      {
        method: 'GET',
        headers: { ...this.additionalHeaders, Authorization: authorization },
      },
      context,
    )
  }

  /**
   * Build the `Authorization: OAuth ...` header. Query parameters of `url`
   * and `extraOAuthParams` take part in the signature.
   */
  authorizationHeader(
    method: string,
    url: string,
    extraOAuthParams: Array<[string, string]>,
    token?: RequestToken,
  ): string {
    const oauthParams: Array<[string, string]> = [
      ['oauth_consumer_key', this.consumerKey],
      ['oauth_nonce', this.nonce()],
      ['oauth_signature_method', this.signatureMethod],
      ['oauth_timestamp', String(Math.floor(this.now().getTime() / 1000))],
      ['oauth_version', '1.0'],
      ...extraOAuthParams,
    ]
    if (token?.token) {
      oauthParams.push(['oauth_token', token.token])
    }

    const queryParams: Array<[string, string]> = [
      ...new URL(url).searchParams.entries(),
    ]
    const baseString = signatureBaseString(method, url, [
      ...oauthParams,
      ...queryParams,
    ])
    const signature = sign(this.signatureMethod, baseString, {
      consumerSecret: this.consumerSecret,
      tokenSecret: token?.secret ?? '',
      privateKey: this.privateKey,
    })

    const headerParams = [...oauthParams, ['oauth_signature', signature]]
    return `OAuth ${headerParams
      .map(([key, value]) => `${percentEncode(key)}="${percentEncode(value)}"`)
      .join(', ')}`
  }

  private async postForToken(
    url: string,
    extraOAuthParams: Array<[string, string]>,
    token: RequestToken | undefined,
    context: RequestContext,
  ): Promise<Record<string, string>> {
    const authorization = this.authorizationHeader(
      'POST',
      url,
      extraOAuthParams,
      token,
    )
    const response = await sendRequest(
      url,
      {
        method: 'POST',
        headers: { ...this.additionalHeaders, Authorization: authorization },
      },
      context,
    )
    const text = await response.text()
    if (!response.ok) {
      throw new Error(
        `oauth1: ${context.provider} responded with a ${response.status}: ${text}`,
      )
    }
    return parseForm(text)
  }

  private toAccessToken(data: Record<string, string>): AccessToken {
    const { oauth_token: token, oauth_token_secret: secret, ...rest } = data
    if (!token) {
      throw new Error('oauth1: access token response missing oauth_token')
    }
    return { token, secret: secret ?? '', additionalData: rest }
  }
}
