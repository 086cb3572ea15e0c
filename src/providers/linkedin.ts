import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const LINKEDIN_AUTH_URL =
  'https://www.linkedin.com/oauth/v2/authorization'
export const LINKEDIN_TOKEN_URL = 'https://www.linkedin.com/oauth/v2/accessToken'
export const LINKEDIN_USERINFO_URL = 'https://api.linkedin.com/v2/userinfo'

interface LinkedInUserInfo {
  sub?: string
  name?: string
  given_name?: string
  family_name?: string
  email?: string
  picture?: string
  locale?: { country?: string; language?: string }
}

/** Sign In with LinkedIn using OpenID Connect. */
export class LinkedInProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'linkedin',
        endpoint: {
          authUrl: LINKEDIN_AUTH_URL,
          tokenUrl: LINKEDIN_TOKEN_URL,
        },
        defaultScopes: ['openid', 'profile', 'email'],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const info = await getJson<LinkedInUserInfo>(LINKEDIN_USERINFO_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(info),
      userId: info.sub,
      name: info.name,
      firstName: info.given_name,
      lastName: info.family_name,
      nickName: info.given_name,
      email: info.email,
      avatarUrl: info.picture,
      location: info.locale?.country,
    }
  }
}
