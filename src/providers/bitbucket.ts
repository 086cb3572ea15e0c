import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const BITBUCKET_AUTH_URL = 'https://bitbucket.org/site/oauth2/authorize'
export const BITBUCKET_TOKEN_URL =
  'https://bitbucket.org/site/oauth2/access_token'
export const BITBUCKET_PROFILE_URL = 'https://api.bitbucket.org/2.0/user'
export const BITBUCKET_EMAILS_URL = 'https://api.bitbucket.org/2.0/user/emails'

interface BitbucketProfile {
  uuid?: string
  username?: string
  display_name?: string
  location?: string | null
  links?: { avatar?: { href?: string } }
}

interface BitbucketEmail {
  email: string
  is_primary: boolean
  is_confirmed: boolean
}

interface BitbucketEmailPage {
  values?: BitbucketEmail[]
}

export class BitbucketProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'bitbucket',
        endpoint: {
          authUrl: BITBUCKET_AUTH_URL,
          tokenUrl: BITBUCKET_TOKEN_URL,
        },
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const headers = bearer(session.accessToken)
    const profile = await getJson<BitbucketProfile>(BITBUCKET_PROFILE_URL, {
      ...this.requestContext(),
      headers,
    })
    const emails = await getJson<BitbucketEmailPage>(BITBUCKET_EMAILS_URL, {
      ...this.requestContext('fetch email addresses'),
      headers,
    })

    const primary = (emails.values ?? []).find(
      (address) => address.is_primary && address.is_confirmed,
    )
    if (!primary) {
      throw new Error(
        `${this.providerName} did not return any confirmed, primary email address`,
      )
    }

    return {
      rawData: toRawData(profile),
      name: profile.display_name,
      nickName: profile.username,
      avatarUrl: profile.links?.avatar?.href,
      userId: profile.uuid,
      location: profile.location ?? '',
      email: primary.email,
    }
  }
}
