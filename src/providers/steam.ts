import type { Token } from '../oauth2/token.ts'
import {
  getJson,
  type HttpClient,
  type RequestContext,
  sendRequest,
} from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import { parseSessionData, readString } from './session-data.ts'
import {
  NO_AUTH_URL_ERROR_MESSAGE,
  type Params,
  type Provider,
  type Session,
} from './types/provider.ts'
import { createUser, type User } from './types/user.ts'

export const STEAM_LOGIN_URL = 'https://steamcommunity.com/openid/login'
export const STEAM_PLAYER_SUMMARIES_URL =
  'https://api.steampowered.com/ISteamUser/GetPlayerSummaries/v0002/'

const OPENID_NS = 'http://specs.openid.net/auth/2.0'
const OPENID_IDENTIFIER_SELECT = 'http://specs.openid.net/auth/2.0/identifier_select'
const CLAIMED_ID_PATTERN = /^https?:\/\/steamcommunity\.com\/openid\/id\/(\d+)$/

export const STEAM_NO_EMAIL = 'No email is provided by the Steam API'
export const STEAM_NO_DESCRIPTION = 'No description is provided by the Steam API'

export interface SteamProviderOptions {
  apiKey: string
  callbackUrl: string
  httpClient?: HttpClient
}

interface SteamPlayer {
  steamid?: string
  personaname?: string
  realname?: string
  avatarfull?: string
  loccountrycode?: string
  locstatecode?: string
}

interface PlayerSummariesResponse {
  response?: { players?: SteamPlayer[] }
}

export interface SteamSessionData {
  authUrl?: string
  callbackUrl?: string
  steamId?: string
  responseNonce?: string
}

export class SteamSession implements Session {
  authUrl: string
  callbackUrl: string
  steamId: string
  responseNonce: string

  constructor(data: SteamSessionData = {}) {
    this.authUrl = data.authUrl ?? ''
    this.callbackUrl = data.callbackUrl ?? ''
    this.steamId = data.steamId ?? ''
    this.responseNonce = data.responseNonce ?? ''
  }

  static fromJSON(data: string): SteamSession {
    const parsed = parseSessionData(data)
    return new SteamSession({
      authUrl: readString(parsed, 'authUrl'),
      callbackUrl: readString(parsed, 'callbackUrl'),
      steamId: readString(parsed, 'steamId'),
      responseNonce: readString(parsed, 'responseNonce'),
    })
  }

  getAuthUrl(): string {
    if (!this.authUrl) {
      throw new Error(NO_AUTH_URL_ERROR_MESSAGE)
    }
    return this.authUrl
  }

  /**
   * Confirm the OpenID 2.0 positive assertion with Steam
   * (`check_authentication`) and extract the SteamID from the claimed id.
   */
  async authorize(provider: Provider, params: Params): Promise<string> {
    if (!(provider instanceof SteamProvider)) {
      throw new Error(`${provider.name()} cannot authorize a Steam session`)
    }
    if (params.get('openid.mode') !== 'id_res') {
      throw new Error('Mode must equal to "id_res".')
    }
    if (params.get('openid.return_to') !== this.callbackUrl) {
      throw new Error('The "return_to url" must match the url of current request.')
    }

    await provider.checkAuthentication(params)

    const match = CLAIMED_ID_PATTERN.exec(params.get('openid.claimed_id') ?? '')
    if (!match) {
      throw new Error('Unable to find a SteamID in the claimed identifier.')
    }
    this.steamId = match[1]
    this.responseNonce = params.get('openid.response_nonce') ?? ''
    return this.responseNonce
  }

  marshal(): string {
    return JSON.stringify(this)
  }

  toJSON(): Record<string, unknown> {
    return {
      authUrl: this.authUrl,
      callbackUrl: this.callbackUrl,
      steamId: this.steamId,
      responseNonce: this.responseNonce,
    }
  }
}

/**
 * Steam sign-in through OpenID 2.0. Profiles come from the Steam Web API,
 * which needs a publisher API key rather than a user token.
 */
export class SteamProvider implements Provider {
  readonly apiKey: string
  readonly callbackUrl: string
  httpClient?: HttpClient

  private providerName = 'steam'
  private isDebug = false

  constructor(options: SteamProviderOptions) {
    this.apiKey = options.apiKey
    this.callbackUrl = options.callbackUrl
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
      'openid.claimed_id': OPENID_IDENTIFIER_SELECT,
      'openid.identity': OPENID_IDENTIFIER_SELECT,
      'openid.mode': 'checkid_setup',
      'openid.ns': OPENID_NS,
      'openid.realm': realmOf(this.callbackUrl),
      'openid.return_to': this.callbackUrl,
    })
    return new SteamSession({
      authUrl: `${STEAM_LOGIN_URL}?${query.toString()}`,
      callbackUrl: this.callbackUrl,
    })
  }

  unmarshalSession(data: string): Session {
    return SteamSession.fromJSON(data)
  }

  /**
   * Echo the signed assertion back to Steam with
   * `openid.mode=check_authentication`; the reply must say `is_valid:true`.
   */
  async checkAuthentication(params: Params): Promise<void> {
    const form = new URLSearchParams()
    for (const name of ['ns', 'assoc_handle', 'signed', 'sig']) {
      form.set(`openid.${name}`, params.get(`openid.${name}`) ?? '')
    }
    for (const field of (params.get('openid.signed') ?? '').split(',')) {
      if (field) {
        form.set(`openid.${field}`, params.get(`openid.${field}`) ?? '')
      }
    }
    form.set('openid.mode', 'check_authentication')

    const response = await sendRequest(
      STEAM_LOGIN_URL,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
      },
      this.requestContext('validate the OpenID response'),
    )
    const text = await response.text()
    const valid = text
      .split('\n')
      .some((line) => line.trim() === 'is_valid:true')
    if (!response.ok || !valid) {
      throw new Error('Unable to validate openId.')
    }
  }

  async fetchUser(session: Session): Promise<User> {
    if (!(session instanceof SteamSession)) {
      throw new Error(
        `${this.providerName} cannot use a session created by another provider type`,
      )
    }
    if (!session.steamId) {
      throw new Error(
        `${this.providerName} cannot get user information without SteamID`,
      )
    }

    const query = new URLSearchParams({
      key: this.apiKey,
      steamids: session.steamId,
    })
    const summaries = await getJson<PlayerSummariesResponse>(
      `${STEAM_PLAYER_SUMMARIES_URL}?${query.toString()}`,
      { ...this.requestContext(), headers: { Accept: 'application/json' } },
    )
    const player = summaries.response?.players?.[0]
    if (!player) {
      throw new Error(`${this.providerName} returned no player summary`)
    }

    return createUser(this.providerName, {
      rawData: toRawData(player),
      userId: player.steamid ?? '',
      nickName: player.personaname ?? '',
      name: player.realname ?? '',
      avatarUrl: player.avatarfull ?? '',
      email: STEAM_NO_EMAIL,
      description: STEAM_NO_DESCRIPTION,
      location: [player.locstatecode, player.loccountrycode]
        .filter((part) => part)
        .join(', '),
    })
  }

  refreshTokenAvailable(): boolean {
    return false
  }

  async refreshToken(_refreshToken: string): Promise<Token> {
    throw new Error(`Refresh token is not provided by ${this.providerName}`)
  }

  private requestContext(purpose?: string): RequestContext {
    return {
      provider: this.providerName,
      client: this.httpClient,
      debug: this.isDebug,
      purpose,
    }
  }
}

/** OpenID realm: scheme and host of the callback. */
const realmOf = (callbackUrl: string): string => {
  try {
    const url = new URL(callbackUrl)
    return `${url.protocol}//${url.host}`
  } catch {
    // relative callback URLs have no realm of their own
    return '://'
  }
}
