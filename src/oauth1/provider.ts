import type { HttpClient, RequestContext } from '../plumbing/http.ts'
import type { Token } from '../oauth2/token.ts'
import type { Provider, Session } from '../providers/types/provider.ts'
import { createUser, type User, type UserFields } from '../providers/types/user.ts'
import {
  type AccessToken,
  Consumer,
  type ConsumerOptions,
  type RequestToken,
} from './consumer.ts'
import { OAuth1Session, type VerifierExchanger } from './session.ts'

export interface OAuth1ProviderOptions {
  clientKey: string
  secret: string
  callbackUrl: string
  httpClient?: HttpClient
}

export type OAuth1ConsumerSettings = Omit<
  ConsumerOptions,
  'consumerKey' | 'consumerSecret'
>

/**
 * Shared implementation of the OAuth 1.0a three-legged flow. The `state`
 * argument of `beginAuth` is ignored; OAuth1 has its own request token.
 */
export abstract class OAuth1Provider implements Provider, VerifierExchanger {
  readonly clientKey: string
  readonly secret: string
  readonly callbackUrl: string
  httpClient?: HttpClient

  protected consumer: Consumer
  protected providerName: string
  protected isDebug = false

  constructor(
    name: string,
    consumer: OAuth1ConsumerSettings,
    options: OAuth1ProviderOptions,
  ) {
    this.clientKey = options.clientKey
    this.secret = options.secret
    this.callbackUrl = options.callbackUrl
    this.httpClient = options.httpClient
    this.providerName = name
    this.consumer = new Consumer({
      ...consumer,
      consumerKey: options.clientKey,
      consumerSecret: options.secret,
    })
  }

  name(): string {
    return this.providerName
  }

  setName(name: string): void {
    this.providerName = name
  }

  debug(enabled: boolean): void {
    this.isDebug = enabled
  }

  async beginAuth(_state: string): Promise<Session> {
    const { requestToken, url } = await this.consumer.getRequestTokenAndUrl(
      this.callbackUrl,
      this.requestContext(),
    )
    return new OAuth1Session({ authUrl: url, requestToken })
  }

  unmarshalSession(data: string): Session {
    return OAuth1Session.fromJSON(data)
  }

  async exchangeVerifier(
    requestToken: RequestToken,
    verifier: string,
  ): Promise<AccessToken> {
    return this.consumer.authorizeToken(
      requestToken,
      verifier,
      this.requestContext(),
    )
  }

  async fetchUser(session: Session): Promise<User> {
    if (!(session instanceof OAuth1Session)) {
      throw new Error(
        `${this.providerName} cannot use a session created by another provider type`,
      )
    }
    const accessToken = session.accessToken
    if (!accessToken?.token) {
      throw new Error(
        `${this.providerName} cannot get user information without accessToken`,
      )
    }

    const profile = await this.fetchProfile(accessToken)
    return createUser(this.providerName, {
      ...profile,
      accessToken: accessToken.token,
      accessTokenSecret: accessToken.secret,
      expiresAt: session.expiresAt,
    })
  }

  refreshTokenAvailable(): boolean {
    return false
  }

  async refreshToken(_refreshToken: string): Promise<Token> {
    throw new Error(`Refresh token is not provided by ${this.providerName}`)
  }

  protected abstract fetchProfile(accessToken: AccessToken): Promise<UserFields>

  protected requestContext(purpose?: string): RequestContext {
    return {
      provider: this.providerName,
      client: this.httpClient,
      debug: this.isDebug,
      purpose,
    }
  }

  /** Signed GET returning the parsed JSON body. */
  protected async signedGetJson<T>(
    url: string,
    params: Record<string, string>,
    accessToken: RequestToken,
    purpose = 'fetch user information',
  ): Promise<T> {
    const response = await this.consumer.get(
      url,
      params,
      accessToken,
      this.requestContext(purpose),
    )
    if (!response.ok) {
      throw new Error(
        `${this.providerName} responded with a ${response.status} trying to ${purpose}`,
      )
    }
    return (await response.json()) as T
  }
}
