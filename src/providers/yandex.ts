import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const YANDEX_AUTH_URL = 'https://oauth.yandex.com/authorize'
export const YANDEX_TOKEN_URL = 'https://oauth.yandex.com/token'
export const YANDEX_INFO_URL = 'https://login.yandex.ru/info'

interface YandexInfo {
  id?: string
  login?: string
  display_name?: string
  real_name?: string
  first_name?: string
  last_name?: string
  default_email?: string
  default_avatar_id?: string
  is_avatar_empty?: boolean
}

export const yandexAvatarUrl = (info: YandexInfo): string =>
  info.default_avatar_id && !info.is_avatar_empty
    ? `https://avatars.yandex.net/get-yapic/${info.default_avatar_id}/islands-200`
    : ''

export class YandexProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'yandex',
        endpoint: { authUrl: YANDEX_AUTH_URL, tokenUrl: YANDEX_TOKEN_URL },
        defaultScopes: ['login:email', 'login:info', 'login:avatar'],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(YANDEX_INFO_URL)
    url.searchParams.set('format', 'json')
    const info = await getJson<YandexInfo>(url, {
      ...this.requestContext(),
      headers: { Authorization: `OAuth ${session.accessToken}` },
    })
    return {
      rawData: toRawData(info),
      userId: info.id,
      nickName: info.login,
      name: info.real_name ?? info.display_name,
      firstName: info.first_name,
      lastName: info.last_name,
      email: info.default_email,
      avatarUrl: yandexAvatarUrl(info),
    }
  }
}
