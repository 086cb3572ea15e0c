import { parseTokenBody, parseTokenResponse } from '../oauth2/config.ts'
import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import { OAuth2Session } from '../oauth2/session.ts'
import type { Token } from '../oauth2/token.ts'
import { getJson, sendRequest } from '../plumbing/http.ts'
import { idString, toRawData } from './profile.ts'
import type { Params, Session } from './types/provider.ts'
import type { UserFields } from './types/user.ts'

export const DEEZER_AUTH_URL = 'https://connect.deezer.com/oauth/auth.php'
export const DEEZER_TOKEN_URL =
  'https://connect.deezer.com/oauth/access_token.php'
export const DEEZER_PROFILE_URL = 'https://api.deezer.com/user/me'

interface DeezerProfile {
  id?: number
  name?: string
  firstname?: string
  lastname?: string
  email?: string
  picture?: string
  city?: string
}

/**
 * Deezer predates RFC 6749: the app id goes in `app_id`, scopes are a
 * comma list in `perms` and the token is fetched with a GET.
 */
export class DeezerProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'deezer',
        endpoint: { authUrl: DEEZER_AUTH_URL, tokenUrl: DEEZER_TOKEN_URL },
        requiredScopes: ['email'],
        refreshTokenAvailable: false,
      },
      options,
    )
  }

  async beginAuth(state: string): Promise<Session> {
    const query = new URLSearchParams({
      app_id: this.clientKey,
      redirect_uri: this.callbackUrl,
      perms: this.scopes.join(','),
    })
    if (state) {
      query.set('state', state)
    }
    return new OAuth2Session({
      authUrl: `${DEEZER_AUTH_URL}?${query.toString()}`,
    })
  }

  async exchangeCode(_session: OAuth2Session, params: Params): Promise<Token> {
    const url = new URL(DEEZER_TOKEN_URL)
    url.searchParams.set('app_id', this.clientKey)
    url.searchParams.set('secret', this.secret)
    url.searchParams.set('code', params.get('code') ?? '')
    url.searchParams.set('output', 'json')

    const response = await sendRequest(url, { method: 'GET' }, this.requestContext())
    const text = await response.text()
    if (!response.ok) {
      throw new Error(
        `oauth2: cannot fetch token: ${response.status}\nResponse: ${text}`,
      )
    }
    return parseTokenResponse(
      parseTokenBody(response.headers.get('content-type') ?? '', text),
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(DEEZER_PROFILE_URL)
    url.searchParams.set('access_token', session.accessToken)
    const profile = await getJson<DeezerProfile>(url, this.requestContext())
    return {
      rawData: toRawData(profile),
      userId: idString(profile.id),
      email: profile.email,
      firstName: profile.firstname,
      lastName: profile.lastname,
      nickName: profile.name,
      avatarUrl: profile.picture,
      location: profile.city,
    }
  }
}
