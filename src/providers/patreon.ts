import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const PATREON_AUTH_URL = 'https://www.patreon.com/oauth2/authorize'
export const PATREON_TOKEN_URL = 'https://www.patreon.com/api/oauth2/token'
export const PATREON_IDENTITY_URL =
  'https://www.patreon.com/api/oauth2/v2/identity'

export const PatreonScope = {
  identity: 'identity',
  identityEmail: 'identity[email]',
  identityMemberships: 'identity.memberships',
  campaigns: 'campaigns',
  campaignsWebhook: 'w:campaigns.webhook',
  campaignsMembers: 'campaigns.members',
  campaignsMembersEmail: 'campaigns.members[email]',
  campaignsMembersAddress: 'campaigns.members.address',
  campaignsPosts: 'campaigns.posts',
} as const

const IDENTITY_FIELDS = 'about,email,first_name,full_name,image_url,last_name,vanity'

/** JSON:API document returned by the identity endpoint. */
interface PatreonIdentity {
  data?: {
    id?: string
    attributes?: {
      about?: string | null
      email?: string
      first_name?: string
      full_name?: string
      image_url?: string
      last_name?: string
      vanity?: string | null
    }
  }
}

export class PatreonProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'patreon',
        endpoint: { authUrl: PATREON_AUTH_URL, tokenUrl: PATREON_TOKEN_URL },
        requiredScopes: [PatreonScope.identity, PatreonScope.identityEmail],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(PATREON_IDENTITY_URL)
    url.searchParams.set('fields[user]', IDENTITY_FIELDS)
    const identity = await getJson<PatreonIdentity>(url, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    const attributes = identity.data?.attributes ?? {}
    return {
      rawData: toRawData(identity),
      userId: identity.data?.id,
      name: attributes.full_name,
      firstName: attributes.first_name,
      lastName: attributes.last_name,
      nickName: attributes.vanity ?? '',
      email: attributes.email,
      description: attributes.about ?? '',
      avatarUrl: attributes.image_url,
    }
  }
}
