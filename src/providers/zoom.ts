import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { joinName, toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const ZOOM_AUTH_URL = 'https://zoom.us/oauth/authorize'
export const ZOOM_TOKEN_URL = 'https://zoom.us/oauth/token'
export const ZOOM_PROFILE_URL = 'https://api.zoom.us/v2/users/me'

interface ZoomUser {
  id?: string
  first_name?: string
  last_name?: string
  email?: string
  pic_url?: string
  location?: string
}

export class ZoomProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'zoom',
        endpoint: {
          authUrl: ZOOM_AUTH_URL,
          tokenUrl: ZOOM_TOKEN_URL,
          authStyle: 'header',
        },
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const user = await getJson<ZoomUser>(ZOOM_PROFILE_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(user),
      userId: user.id,
      email: user.email,
      firstName: user.first_name,
      lastName: user.last_name,
      name: joinName(user.first_name, user.last_name),
      avatarUrl: user.pic_url,
      location: user.location,
    }
  }
}
