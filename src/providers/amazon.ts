import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const AMAZON_AUTH_URL = 'https://www.amazon.com/ap/oa'
export const AMAZON_TOKEN_URL = 'https://api.amazon.com/auth/o2/token'
export const AMAZON_PROFILE_URL = 'https://api.amazon.com/user/profile'

interface AmazonProfile {
  user_id?: string
  name?: string
  email?: string
  postal_code?: string
}

export class AmazonProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'amazon',
        endpoint: { authUrl: AMAZON_AUTH_URL, tokenUrl: AMAZON_TOKEN_URL },
        defaultScopes: ['profile', 'postal_code'],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<AmazonProfile>(AMAZON_PROFILE_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(profile),
      email: profile.email,
      name: profile.name,
      nickName: profile.name,
      userId: profile.user_id,
      location: profile.postal_code,
    }
  }
}
