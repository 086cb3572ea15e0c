import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const SALESFORCE_AUTH_URL =
  'https://login.salesforce.com/services/oauth2/authorize'
export const SALESFORCE_TOKEN_URL =
  'https://login.salesforce.com/services/oauth2/token'

interface SalesforceIdentity {
  user_id?: string
  display_name?: string
  nick_name?: string
  first_name?: string
  last_name?: string
  email?: string
  addr_country?: string | null
  photos?: { picture?: string; thumbnail?: string }
}

/**
 * The token response names the identity URL of the user in its `id`
 * field; the profile is read from there.
 */
export class SalesforceProvider extends OAuth2Provider {
  tokenExtraKeys = ['id', 'instance_url'] as const

  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'salesforce',
        endpoint: {
          authUrl: SALESFORCE_AUTH_URL,
          tokenUrl: SALESFORCE_TOKEN_URL,
        },
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const identityUrl = session.extra.id
    if (!identityUrl) {
      throw new Error(
        `${this.providerName} session is missing the identity URL`,
      )
    }
    const identity = await getJson<SalesforceIdentity>(identityUrl, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(identity),
      userId: identity.user_id,
      name: identity.display_name,
      nickName: identity.nick_name,
      firstName: identity.first_name,
      lastName: identity.last_name,
      email: identity.email,
      location: identity.addr_country ?? '',
      avatarUrl: identity.photos?.picture,
    }
  }
}
