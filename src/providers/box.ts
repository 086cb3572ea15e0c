import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const BOX_AUTH_URL = 'https://account.box.com/api/oauth2/authorize'
export const BOX_TOKEN_URL = 'https://api.box.com/oauth2/token'
export const BOX_PROFILE_URL = 'https://api.box.com/2.0/users/me'

interface BoxProfile {
  id?: string
  name?: string
  login?: string
  address?: string
  avatar_url?: string
}

export class BoxProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'box',
        endpoint: { authUrl: BOX_AUTH_URL, tokenUrl: BOX_TOKEN_URL },
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<BoxProfile>(BOX_PROFILE_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(profile),
      email: profile.login,
      name: profile.name,
      nickName: profile.name,
      userId: profile.id,
      location: profile.address,
      avatarUrl: profile.avatar_url,
    }
  }
}
