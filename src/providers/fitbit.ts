import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const FITBIT_AUTH_URL = 'https://www.fitbit.com/oauth2/authorize'
export const FITBIT_TOKEN_URL = 'https://api.fitbit.com/oauth2/token'
// '-' is the logged in user
export const FITBIT_PROFILE_URL = 'https://api.fitbit.com/1/user/-/profile.json'

export const FitbitScope = {
  activity: 'activity',
  heartRate: 'heartrate',
  location: 'location',
  nutrition: 'nutrition',
  profile: 'profile',
  settings: 'settings',
  sleep: 'sleep',
  social: 'social',
  weight: 'weight',
} as const

interface FitbitProfile {
  user?: {
    encodedId?: string
    avatar?: string
    country?: string
    fullName?: string
    displayName?: string
    aboutMe?: string
  }
}

export class FitbitProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'fitbit',
        endpoint: {
          authUrl: FITBIT_AUTH_URL,
          tokenUrl: FITBIT_TOKEN_URL,
          authStyle: 'header',
        },
        requiredScopes: [FitbitScope.profile],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const data = await getJson<FitbitProfile>(FITBIT_PROFILE_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(data),
      userId: data.user?.encodedId,
      location: data.user?.country,
      name: data.user?.fullName,
      nickName: data.user?.displayName,
      avatarUrl: data.user?.avatar,
      description: data.user?.aboutMe,
    }
  }
}
