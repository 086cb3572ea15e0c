import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const INSTAGRAM_AUTH_URL = 'https://api.instagram.com/oauth/authorize/'
export const INSTAGRAM_TOKEN_URL = 'https://api.instagram.com/oauth/access_token'
export const INSTAGRAM_PROFILE_URL = 'https://graph.instagram.com/me'

const PROFILE_FIELDS = 'id,username,account_type,media_count'

interface InstagramProfile {
  id?: string
  username?: string
  account_type?: string
  media_count?: number
  name?: string
  biography?: string
  profile_picture_url?: string
}

export class InstagramProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'instagram',
        endpoint: {
          authUrl: INSTAGRAM_AUTH_URL,
          tokenUrl: INSTAGRAM_TOKEN_URL,
        },
        requiredScopes: ['user_profile'],
        scopeSeparator: ',',
        refreshTokenAvailable: false,
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(INSTAGRAM_PROFILE_URL)
    url.searchParams.set('fields', PROFILE_FIELDS)
    url.searchParams.set('access_token', session.accessToken)
    const profile = await getJson<InstagramProfile>(url, this.requestContext())
    return {
      rawData: toRawData(profile),
      userId: profile.id,
      nickName: profile.username,
      name: profile.name,
      description: profile.biography,
      avatarUrl: profile.profile_picture_url,
    }
  }
}
