import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { getJson } from '../plumbing/http.ts'
import { idString, joinName, toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const VK_AUTH_URL = 'https://oauth.vk.com/authorize'
export const VK_TOKEN_URL = 'https://oauth.vk.com/access_token'
export const VK_USERS_GET_URL = 'https://api.vk.com/method/users.get'
export const VK_API_VERSION = '5.131'

interface VKUsersGet {
  response?: Array<{
    id?: number
    first_name?: string
    last_name?: string
    nickname?: string
    photo_200?: string
  }>
}

/** VK returns the email with the token rather than on the profile. */
export class VKProvider extends OAuth2Provider {
  tokenExtraKeys = ['email'] as const

  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'vk',
        endpoint: { authUrl: VK_AUTH_URL, tokenUrl: VK_TOKEN_URL },
        requiredScopes: ['email'],
        refreshTokenAvailable: false,
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(VK_USERS_GET_URL)
    url.searchParams.set('fields', 'photo_200,nickname')
    url.searchParams.set('access_token', session.accessToken)
    url.searchParams.set('v', VK_API_VERSION)

    const data = await getJson<VKUsersGet>(url, this.requestContext())
    const user = data.response?.[0]
    if (!user) {
      throw new Error(`${this.providerName} cannot get user information`)
    }
    return {
      rawData: toRawData(data),
      userId: idString(user.id),
      firstName: user.first_name,
      lastName: user.last_name,
      name: joinName(user.first_name, user.last_name),
      nickName: user.nickname,
      avatarUrl: user.photo_200,
      email: session.extra.email,
    }
  }
}
