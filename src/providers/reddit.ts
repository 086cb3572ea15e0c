import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const REDDIT_AUTH_URL = 'https://www.reddit.com/api/v1/authorize'
export const REDDIT_TOKEN_URL = 'https://www.reddit.com/api/v1/access_token'
export const REDDIT_USER_URL = 'https://oauth.reddit.com/api/v1/me'

export type RedditDuration = 'temporary' | 'permanent'

export interface RedditProviderOptions extends OAuth2ProviderOptions {
  /** `permanent` asks for a refresh token. */
  duration?: RedditDuration
  /** Reddit rejects generic user agents. */
  userAgent?: string
}

interface RedditUser {
  id?: string
  name?: string
  icon_img?: string
}

export class RedditProvider extends OAuth2Provider {
  readonly duration: RedditDuration
  readonly userAgent: string

  constructor(options: RedditProviderOptions) {
    const userAgent = options.userAgent ?? 'multiauth'
    super(
      {
        name: 'reddit',
        endpoint: {
          authUrl: REDDIT_AUTH_URL,
          tokenUrl: REDDIT_TOKEN_URL,
          authStyle: 'header',
        },
        defaultScopes: ['identity'],
        tokenHeaders: { 'User-Agent': userAgent },
      },
      options,
    )
    this.duration = options.duration ?? 'permanent'
    this.userAgent = userAgent
  }

  protected authCodeParams(): Record<string, string> {
    return { duration: this.duration }
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const user = await getJson<RedditUser>(REDDIT_USER_URL, {
      ...this.requestContext(),
      headers: {
        'User-Agent': this.userAgent,
        ...bearer(session.accessToken),
      },
    })
    return {
      rawData: toRawData(user),
      userId: user.id,
      name: user.name,
      nickName: user.name,
      avatarUrl: user.icon_img,
    }
  }
}
