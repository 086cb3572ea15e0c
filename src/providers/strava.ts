import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { idString, joinName, toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const STRAVA_AUTH_URL = 'https://www.strava.com/oauth/authorize'
export const STRAVA_TOKEN_URL = 'https://www.strava.com/oauth/token'
export const STRAVA_ATHLETE_URL = 'https://www.strava.com/api/v3/athlete'

interface StravaAthlete {
  id?: number
  username?: string | null
  firstname?: string
  lastname?: string
  city?: string | null
  state?: string | null
  country?: string | null
  sex?: string | null
  profile?: string
}

export class StravaProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'strava',
        endpoint: { authUrl: STRAVA_AUTH_URL, tokenUrl: STRAVA_TOKEN_URL },
        defaultScopes: ['read'],
        scopeSeparator: ',',
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const athlete = await getJson<StravaAthlete>(STRAVA_ATHLETE_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(athlete),
      userId: idString(athlete.id),
      name: joinName(athlete.firstname, athlete.lastname),
      firstName: athlete.firstname,
      lastName: athlete.lastname,
      nickName: athlete.username ?? '',
      avatarUrl: athlete.profile,
      description: JSON.stringify({ gender: athlete.sex ?? '' }),
      location: JSON.stringify({
        city: athlete.city ?? '',
        region: athlete.state ?? '',
        country: athlete.country ?? '',
      }),
    }
  }
}
