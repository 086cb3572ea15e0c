import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const GOOGLE_AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth'
export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token'
export const GOOGLE_USERINFO_URL =
  'https://openidconnect.googleapis.com/v1/userinfo'

export const GOOGLE_DEFAULT_SCOPES = ['openid', 'profile', 'email'] as const

interface GoogleUserInfo {
  sub?: string
  email?: string
  email_verified?: boolean
  name?: string
  given_name?: string
  family_name?: string
  picture?: string
  hd?: string
}

export class GoogleProvider extends OAuth2Provider {
  private readonly authParams = new Map<string, string>([
    ['access_type', 'offline'],
  ])

  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'google',
        endpoint: { authUrl: GOOGLE_AUTH_URL, tokenUrl: GOOGLE_TOKEN_URL },
        defaultScopes: [...GOOGLE_DEFAULT_SCOPES],
      },
      options,
    )
  }

  /** Space separated prompts, e.g. `consent select_account`. */
  setPrompt(...prompts: string[]): void {
    this.setAuthParam('prompt', prompts.join(' '))
  }

  /** Restrict sign-in to one Google Workspace domain. */
  setHostedDomain(hd: string): void {
    this.setAuthParam('hd', hd)
  }

  setLoginHint(loginHint: string): void {
    this.setAuthParam('login_hint', loginHint)
  }

  /** `online` drops the refresh token from the exchange. */
  setAccessType(accessType: 'online' | 'offline'): void {
    this.setAuthParam('access_type', accessType)
  }

  protected authCodeParams(): Record<string, string> {
    return Object.fromEntries(this.authParams)
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const info = await getJson<GoogleUserInfo>(GOOGLE_USERINFO_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(info),
      userId: info.sub,
      email: info.email,
      name: info.name,
      firstName: info.given_name,
      lastName: info.family_name,
      nickName: info.name,
      avatarUrl: info.picture,
    }
  }

  private setAuthParam(key: string, value: string): void {
    if (value) {
      this.authParams.set(key, value)
    } else {
      this.authParams.delete(key)
    }
  }
}
