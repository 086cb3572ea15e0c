import type { AccessToken } from '../oauth1/consumer.ts'
import {
  OAuth1Provider,
  type OAuth1ProviderOptions,
} from '../oauth1/provider.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const TUMBLR_REQUEST_TOKEN_URL =
  'https://www.tumblr.com/oauth/request_token'
export const TUMBLR_AUTHORIZE_URL = 'https://www.tumblr.com/oauth/authorize'
export const TUMBLR_ACCESS_TOKEN_URL =
  'https://www.tumblr.com/oauth/access_token'
export const TUMBLR_PROFILE_URL = 'https://api.tumblr.com/v2/user/info'

interface TumblrUserInfo {
  response?: {
    user?: {
      name?: string
      blogs?: Array<{ url?: string; title?: string; description?: string }>
    }
  }
}

export class TumblrProvider extends OAuth1Provider {
  constructor(options: OAuth1ProviderOptions) {
    super(
      'tumblr',
      {
        serviceProvider: {
          requestTokenUrl: TUMBLR_REQUEST_TOKEN_URL,
          authorizeTokenUrl: TUMBLR_AUTHORIZE_URL,
          accessTokenUrl: TUMBLR_ACCESS_TOKEN_URL,
        },
      },
      options,
    )
  }

  protected async fetchProfile(accessToken: AccessToken): Promise<UserFields> {
    const info = await this.signedGetJson<TumblrUserInfo>(
      TUMBLR_PROFILE_URL,
      {},
      accessToken,
    )
    const user = info.response?.user
    if (!user) {
      throw new Error(`${this.providerName} returned no user in user/info`)
    }

    // Tumblr has no numeric user id; the account name is unique
    return {
      rawData: toRawData(info),
      userId: user.name ?? '',
      name: user.name ?? '',
      nickName: user.name ?? '',
    }
  }
}
