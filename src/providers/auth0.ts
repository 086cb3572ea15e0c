import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export interface Auth0ProviderOptions extends OAuth2ProviderOptions {
  /** Tenant domain, e.g. `example.eu.auth0.com`. */
  domain: string
}

interface Auth0Profile {
  sub?: string
  user_id?: string
  name?: string
  nickname?: string
  email?: string
  picture?: string
  given_name?: string
  family_name?: string
}

export class Auth0Provider extends OAuth2Provider {
  readonly domain: string

  constructor(options: Auth0ProviderOptions) {
    const base = `https://${options.domain}`
    super(
      {
        name: 'auth0',
        endpoint: {
          authUrl: `${base}/authorize`,
          tokenUrl: `${base}/oauth/token`,
        },
        defaultScopes: ['profile', 'openid'],
      },
      options,
    )
    this.domain = options.domain
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<Auth0Profile>(
      `https://${this.domain}/userinfo`,
      { ...this.requestContext(), headers: bearer(session.accessToken) },
    )
    return {
      rawData: toRawData(profile),
      email: profile.email,
      name: profile.name,
      nickName: profile.nickname,
      firstName: profile.given_name,
      lastName: profile.family_name,
      userId: profile.user_id ?? profile.sub,
      avatarUrl: profile.picture,
    }
  }
}
