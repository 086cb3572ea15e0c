import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const SPOTIFY_AUTH_URL = 'https://accounts.spotify.com/authorize'
export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token'
export const SPOTIFY_USER_URL = 'https://api.spotify.com/v1/me'

export const SpotifyScope = {
  playlistReadPrivate: 'playlist-read-private',
  playlistModifyPublic: 'playlist-modify-public',
  playlistModifyPrivate: 'playlist-modify-private',
  userFollowModify: 'user-follow-modify',
  userFollowRead: 'user-follow-read',
  userLibraryModify: 'user-library-modify',
  userLibraryRead: 'user-library-read',
  userReadPrivate: 'user-read-private',
  userReadEmail: 'user-read-email',
} as const

interface SpotifyUser {
  id?: string
  display_name?: string | null
  email?: string
  country?: string
  images?: Array<{ url?: string }>
}

export class SpotifyProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'spotify',
        endpoint: {
          authUrl: SPOTIFY_AUTH_URL,
          tokenUrl: SPOTIFY_TOKEN_URL,
          authStyle: 'header',
        },
        requiredScopes: [
          SpotifyScope.userReadEmail,
          SpotifyScope.userReadPrivate,
        ],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const user = await getJson<SpotifyUser>(SPOTIFY_USER_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(user),
      userId: user.id,
      name: user.display_name ?? '',
      email: user.email,
      location: user.country,
      avatarUrl: user.images?.[0]?.url,
    }
  }
}
