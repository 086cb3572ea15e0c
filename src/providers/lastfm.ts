import crypto from 'node:crypto'
import type { Token } from '../oauth2/token.ts'
import {
  type HttpClient,
  type RequestContext,
  sendRequest,
} from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import {
  parseSessionData,
  readString,
} from './session-data.ts'
import {
  NO_AUTH_URL_ERROR_MESSAGE,
  type Params,
  type Provider,
  type Session,
} from './types/provider.ts'
import { createUser, type User } from './types/user.ts'

export const LASTFM_AUTH_URL = 'https://www.last.fm/api/auth/'
export const LASTFM_API_URL = 'https://ws.audioscrobbler.com/2.0/'

export interface LastFMProviderOptions {
  clientKey: string
  secret: string
  callbackUrl: string
  userAgent?: string
  httpClient?: HttpClient
}

interface LastFMError {
  error?: number
  message?: string
}

interface LastFMSessionResponse extends LastFMError {
  session?: { name?: string; key?: string; subscriber?: number | string }
}

interface LastFMImage {
  size?: string
  '#text'?: string
}

interface LastFMUserResponse extends LastFMError {
  user?: {
    id?: string
    name?: string
    realname?: string
    url?: string
    country?: string
    image?: LastFMImage[]
  }
}

/**
 * `api_sig`: md5 of the sorted name/value pairs concatenated, followed by
 * the shared secret. `format` and `callback` never take part.
 */
export const signLastFMRequest = (
  secret: string,
  params: Record<string, string>,
): string => {
  const plain = Object.keys(params)
    .filter((key) => key !== 'format' && key !== 'callback')
    .sort()
    .map((key) => `${key}${params[key]}`)
    .join('')
  return crypto.createHash('md5').update(`${plain}${secret}`, 'utf8').digest('hex')
}

/** Largest image wins; last.fm lists them small to extralarge. */
const pickAvatar = (images: LastFMImage[] = []): string => {
  for (const size of ['extralarge', 'large', 'medium', 'small']) {
    const url = images.find((image) => image.size === size)?.['#text']
    if (url) {
      return url
    }
  }
  return ''
}

export interface LastFMSessionData {
  authUrl?: string
  accessToken?: string
  login?: string
}

/**
 * last.fm web auth: the callback carries a `token` that `auth.getSession`
 * trades for a session key and the user's login name.
 */
export class LastFMSession implements Session {
  authUrl: string
  accessToken: string
  login: string

  constructor(data: LastFMSessionData = {}) {
    this.authUrl = data.authUrl ?? ''
    this.accessToken = data.accessToken ?? ''
    this.login = data.login ?? ''
  }

  static fromJSON(data: string): LastFMSession {
    const parsed = parseSessionData(data)
    return new LastFMSession({
      authUrl: readString(parsed, 'authUrl'),
      accessToken: readString(parsed, 'accessToken'),
      login: readString(parsed, 'login'),
    })
  }

  getAuthUrl(): string {
    if (!this.authUrl) {
      throw new Error(NO_AUTH_URL_ERROR_MESSAGE)
    }
    return this.authUrl
  }

  async authorize(provider: Provider, params: Params): Promise<string> {
    if (!(provider instanceof LastFMProvider)) {
      throw new Error(`${provider.name()} cannot authorize a last.fm session`)
    }
    const { login, key } = await provider.getSession(params.get('token') ?? '')
    this.accessToken = key
    this.login = login
    return key
  }

  marshal(): string {
    return JSON.stringify(this)
  }

  toJSON(): Record<string, unknown> {
    return {
      authUrl: this.authUrl,
      accessToken: this.accessToken,
      login: this.login,
    }
  }
}

export class LastFMProvider implements Provider {
  readonly clientKey: string
  readonly secret: string
  readonly callbackUrl: string
  userAgent: string
  httpClient?: HttpClient

  private providerName = 'lastfm'
  private isDebug = false

  constructor(options: LastFMProviderOptions) {
    this.clientKey = options.clientKey
    this.secret = options.secret
    this.callbackUrl = options.callbackUrl
    this.userAgent = options.userAgent ?? 'multiauth'
    this.httpClient = options.httpClient
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
    const query = new URLSearchParams({
      api_key: this.clientKey,
      cb: this.callbackUrl,
    })
    return new LastFMSession({ authUrl: `${LASTFM_AUTH_URL}?${query.toString()}` })
  }

  unmarshalSession(data: string): Session {
    return LastFMSession.fromJSON(data)
  }

  /** Trade the callback token for a session key (`auth.getSession`). */
  async getSession(token: string): Promise<{ login: string; key: string }> {
    const response = await this.request<LastFMSessionResponse>(
      { method: 'auth.getSession', token },
      true,
      'fetch a session',
    )
    const key = response.session?.key ?? ''
    if (!key) {
      throw new Error(`${this.providerName} returned no session key`)
    }
    return { login: response.session?.name ?? '', key }
  }

  async fetchUser(session: Session): Promise<User> {
    if (!(session instanceof LastFMSession)) {
      throw new Error(
        `${this.providerName} cannot use a session created by another provider type`,
      )
    }
    if (!session.accessToken) {
      throw new Error(
        `${this.providerName} cannot get user information without accessToken`,
      )
    }

    const response = await this.request<LastFMUserResponse>(
      { method: 'user.getinfo', user: session.login },
      false,
      'fetch user information',
    )
    const profile = response.user ?? {}
    return createUser(this.providerName, {
      rawData: toRawData(profile),
      accessToken: session.accessToken,
      userId: profile.id || profile.name || '',
      name: profile.realname ?? '',
      nickName: profile.name ?? '',
      avatarUrl: pickAvatar(profile.image),
      location: profile.country ?? '',
    })
  }

  refreshTokenAvailable(): boolean {
    return false
  }

  async refreshToken(_refreshToken: string): Promise<Token> {
    throw new Error(`Refresh token is not provided by ${this.providerName}`)
  }

  private async request<T extends LastFMError>(
    params: Record<string, string>,
    signed: boolean,
    purpose: string,
  ): Promise<T> {
    const query: Record<string, string> = {
      ...params,
      api_key: this.clientKey,
    }
    if (signed) {
      query.api_sig = signLastFMRequest(this.secret, query)
    }
    query.format = 'json'

    const context: RequestContext = {
      provider: this.providerName,
      client: this.httpClient,
      debug: this.isDebug,
      purpose,
    }
    const response = await sendRequest(
      `${LASTFM_API_URL}?${new URLSearchParams(query).toString()}`,
      { method: 'GET', headers: { 'User-Agent': this.userAgent } },
      context,
    )
    // API errors come back as 4xx with a JSON body; only 5xx is fatal here
    if (response.status >= 500) {
      throw new Error(
        `${this.providerName} responded with a ${response.status} trying to ${purpose}`,
      )
    }
    const body = (await response.json()) as T
    if (body.error !== undefined) {
      throw new Error(
        `${this.providerName} request error(${body.error}): ${body.message ?? ''}`,
      )
    }
    return body
  }
}
