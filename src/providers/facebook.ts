import crypto from 'node:crypto'
import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const FACEBOOK_GRAPH_VERSION = 'v21.0'
export const FACEBOOK_AUTH_URL = `https://www.facebook.com/${FACEBOOK_GRAPH_VERSION}/dialog/oauth`
export const FACEBOOK_TOKEN_URL = `https://graph.facebook.com/${FACEBOOK_GRAPH_VERSION}/oauth/access_token`
export const FACEBOOK_PROFILE_URL = `https://graph.facebook.com/${FACEBOOK_GRAPH_VERSION}/me`

export const FACEBOOK_DEFAULT_FIELDS = [
  'email',
  'first_name',
  'last_name',
  'link',
  'about',
  'id',
  'name',
  'picture',
  'location',
] as const

interface FacebookProfile {
  id?: string
  email?: string
  about?: string
  name?: string
  first_name?: string
  last_name?: string
  link?: string
  picture?: { data?: { url?: string } }
  location?: { name?: string }
}

/** HMAC-SHA256 of the access token keyed by the app secret, hex encoded. */
export const appSecretProof = (accessToken: string, secret: string): string =>
  crypto.createHmac('sha256', secret).update(accessToken).digest('hex')

export class FacebookProvider extends OAuth2Provider {
  private fields: string = FACEBOOK_DEFAULT_FIELDS.join(',')

  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'facebook',
        endpoint: { authUrl: FACEBOOK_AUTH_URL, tokenUrl: FACEBOOK_TOKEN_URL },
        requiredScopes: ['email'],
        scopeSeparator: ',',
      },
      options,
    )
  }

  /** Override the Graph API fields requested for the profile. */
  setCustomFields(fields: string[]): void {
    if (fields.length > 0) {
      this.fields = fields.join(',')
    }
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(FACEBOOK_PROFILE_URL)
    url.searchParams.set('fields', this.fields)
    url.searchParams.set('access_token', session.accessToken)
    url.searchParams.set(
      'appsecret_proof',
      appSecretProof(session.accessToken, this.secret),
    )

    const profile = await getJson<FacebookProfile>(url, this.requestContext())
    return {
      rawData: toRawData(profile),
      name: profile.name,
      firstName: profile.first_name,
      lastName: profile.last_name,
      nickName: profile.name,
      email: profile.email,
      description: profile.about,
      avatarUrl: profile.picture?.data?.url,
      userId: profile.id,
      location: profile.location?.name,
    }
  }
}
