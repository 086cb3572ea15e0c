import {
  type HttpClient,
  type RequestContext,
  resolveHttpClient,
} from '../plumbing/http.ts'
import type { Params, Provider, Session } from '../providers/types/provider.ts'
import { createUser, type User, type UserFields } from '../providers/types/user.ts'
import { type Endpoint, OAuth2Config } from './config.ts'
import { type CodeExchanger, OAuth2Session } from './session.ts'
import type { Token } from './token.ts'

export interface OAuth2ProviderOptions {
  clientKey: string
  secret: string
  callbackUrl: string
  scopes?: string[]
  httpClient?: HttpClient
}

export interface OAuth2ProviderDefinition {
  name: string
  endpoint: Endpoint
  /** Used when the caller passes no scopes. */
  defaultScopes?: string[]
  /** Always requested, ahead of any caller scopes. */
  requiredScopes?: string[]
  scopeSeparator?: string
  tokenHeaders?: Record<string, string>
  refreshTokenAvailable?: boolean
}

/**
 * Shared implementation of the authorization-code flow. Subclasses supply
 * endpoints and map the profile response onto a User.
 */
export abstract class OAuth2Provider implements Provider, CodeExchanger {
  readonly clientKey: string
  readonly secret: string
  readonly callbackUrl: string
  httpClient?: HttpClient
  tokenExtraKeys?: readonly string[]

  protected config: OAuth2Config
  protected providerName: string
  protected isDebug = false
  protected readonly requestedScopes: string[]
  private readonly definition: OAuth2ProviderDefinition

  constructor(
    definition: OAuth2ProviderDefinition,
    options: OAuth2ProviderOptions,
  ) {
    this.clientKey = options.clientKey
    this.secret = options.secret
    this.callbackUrl = options.callbackUrl
    this.httpClient = options.httpClient
    this.providerName = definition.name
    this.requestedScopes = options.scopes ?? []
    this.definition = definition
    this.config = this.newConfig(definition.endpoint)
  }

  name(): string {
    return this.providerName
  }

  /** Rename the provider, e.g. to register two instances of one type. */
  setName(name: string): void {
    this.providerName = name
  }

  debug(enabled: boolean): void {
    this.isDebug = enabled
  }

  client(): HttpClient {
    return resolveHttpClient(this.httpClient)
  }

  get scopes(): readonly string[] {
    return this.config.scopes
  }

  async beginAuth(state: string): Promise<Session> {
    const session = new OAuth2Session()
    session.authUrl = this.config.authCodeUrl(
      state,
      this.authCodeParams(session),
    )
    return session
  }

  unmarshalSession(data: string): Session {
    return OAuth2Session.fromJSON(data)
  }

  async exchangeCode(session: OAuth2Session, params: Params): Promise<Token> {
    return this.config.exchange(
      params.get('code') ?? '',
      this.requestContext(),
      this.exchangeParams(session, params),
    )
  }

  async fetchUser(session: Session): Promise<User> {
    const oauthSession = this.assertSession(session)
    const base: UserFields = {
      accessToken: oauthSession.accessToken,
      refreshToken: oauthSession.refreshToken,
      expiresAt: oauthSession.expiresAt,
      idToken: oauthSession.idToken,
    }

    if (!oauthSession.accessToken) {
      throw new Error(
        `${this.providerName} cannot get user information without accessToken`,
      )
    }

    const profile = await this.fetchProfile(oauthSession)
    return createUser(this.providerName, { ...base, ...profile })
  }

  refreshTokenAvailable(): boolean {
    return this.definition.refreshTokenAvailable ?? true
  }

  async refreshToken(refreshToken: string): Promise<Token> {
    if (!this.refreshTokenAvailable()) {
      throw new Error(`Refresh token is not provided by ${this.providerName}`)
    }
    return this.config.refresh(refreshToken, this.requestContext())
  }

  /** Extra query parameters for the authorization URL. */
  protected authCodeParams(_session: OAuth2Session): Record<string, string> {
    return {}
  }

  /** Extra form fields for the token exchange. */
  protected exchangeParams(
    _session: OAuth2Session,
    _params: Params,
  ): Record<string, string> {
    return {}
  }

  protected abstract fetchProfile(session: OAuth2Session): Promise<UserFields>

  protected requestContext(purpose?: string): RequestContext {
    return {
      provider: this.providerName,
      client: this.httpClient,
      debug: this.isDebug,
      purpose,
    }
  }

  /** Rebuild the client configuration after an endpoint change. */
  protected reconfigure(endpoint: Endpoint): void {
    this.config = this.newConfig(endpoint)
  }

  protected assertSession(session: Session): OAuth2Session {
    if (!(session instanceof OAuth2Session)) {
      throw new Error(
        `${this.providerName} cannot use a session created by another provider type`,
      )
    }
    return session
  }

  private resolveScopes(): string[] {
    const requested =
      this.requestedScopes.length > 0
        ? this.requestedScopes
        : (this.definition.defaultScopes ?? [])
    return [...new Set([...(this.definition.requiredScopes ?? []), ...requested])]
  }

  private newConfig(endpoint: Endpoint): OAuth2Config {
    return new OAuth2Config({
      clientId: this.clientKey,
      clientSecret: this.secret,
      redirectUrl: this.callbackUrl,
      endpoint,
      scopes: this.resolveScopes(),
      scopeSeparator: this.definition.scopeSeparator,
      tokenHeaders: this.definition.tokenHeaders,
    })
  }
}
