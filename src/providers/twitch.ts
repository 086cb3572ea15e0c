import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const TWITCH_AUTH_URL = 'https://id.twitch.tv/oauth2/authorize'
export const TWITCH_TOKEN_URL = 'https://id.twitch.tv/oauth2/token'
export const TWITCH_USERS_URL = 'https://api.twitch.tv/helix/users'

export const TWITCH_SCOPE_USER_READ_EMAIL = 'user:read:email'

interface TwitchUsers {
  data?: Array<{
    id?: string
    login?: string
    display_name?: string
    description?: string
    profile_image_url?: string
    email?: string
  }>
}

export class TwitchProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'twitch',
        endpoint: { authUrl: TWITCH_AUTH_URL, tokenUrl: TWITCH_TOKEN_URL },
        defaultScopes: [TWITCH_SCOPE_USER_READ_EMAIL],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const users = await getJson<TwitchUsers>(TWITCH_USERS_URL, {
      ...this.requestContext(),
      headers: { 'Client-Id': this.clientKey, ...bearer(session.accessToken) },
    })
    const user = users.data?.[0]
    if (!user) {
      throw new Error(`${this.providerName} user not found`)
    }
    return {
      rawData: toRawData(user),
      userId: user.id,
      name: user.login,
      nickName: user.display_name,
      email: user.email,
      description: user.description,
      avatarUrl: user.profile_image_url,
    }
  }
}
