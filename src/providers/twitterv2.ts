import { generateCodeChallenge, generateCodeVerifier } from '../oauth2/pkce.ts'
import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const TWITTER_V2_AUTH_URL = 'https://twitter.com/i/oauth2/authorize'
export const TWITTER_V2_TOKEN_URL = 'https://api.twitter.com/2/oauth2/token'
export const TWITTER_V2_ME_URL = 'https://api.twitter.com/2/users/me'

const USER_FIELDS = 'description,location,name,profile_image_url,username'

interface TwitterV2Me {
  data?: {
    id?: string
    name?: string
    username?: string
    description?: string
    location?: string
    profile_image_url?: string
  }
}

/**
 * Twitter / X API v2 with OAuth 2.0 and PKCE. The code verifier travels in
 * the session between the redirect and the callback.
 */
export class TwitterV2Provider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'twitterv2',
        endpoint: {
          authUrl: TWITTER_V2_AUTH_URL,
          tokenUrl: TWITTER_V2_TOKEN_URL,
          authStyle: 'header',
        },
        defaultScopes: ['tweet.read', 'users.read', 'offline.access'],
      },
      options,
    )
  }

  protected authCodeParams(session: OAuth2Session): Record<string, string> {
    session.codeVerifier = generateCodeVerifier()
    return {
      code_challenge: generateCodeChallenge(session.codeVerifier, 'S256'),
      code_challenge_method: 'S256',
    }
  }

  protected exchangeParams(session: OAuth2Session): Record<string, string> {
    return { code_verifier: session.codeVerifier }
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(TWITTER_V2_ME_URL)
    url.searchParams.set('user.fields', USER_FIELDS)
    const me = await getJson<TwitterV2Me>(url, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    const data = me.data ?? {}
    return {
      rawData: toRawData(data),
      userId: data.id,
      name: data.name,
      nickName: data.username,
      description: data.description,
      location: data.location,
      avatarUrl: data.profile_image_url,
    }
  }
}
