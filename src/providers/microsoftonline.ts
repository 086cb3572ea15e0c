import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { azureADV2Endpoint } from './azureadv2.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const MICROSOFT_GRAPH_ME_URL = 'https://graph.microsoft.com/v1.0/me'
export const MICROSOFT_GRAPH_PHOTO_URL =
  'https://graph.microsoft.com/v1.0/me/photo/$value'

interface GraphUser {
  id?: string
  displayName?: string
  givenName?: string
  surname?: string
  mail?: string | null
  userPrincipalName?: string
  officeLocation?: string | null
}

/**
 * Personal and work Microsoft accounts through the `common` tenant.
 */
export class MicrosoftOnlineProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'microsoftonline',
        endpoint: azureADV2Endpoint('common'),
        defaultScopes: ['openid', 'offline_access', 'user.read'],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<GraphUser>(MICROSOFT_GRAPH_ME_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(profile),
      userId: profile.id,
      name: profile.displayName,
      firstName: profile.givenName,
      lastName: profile.surname,
      email: profile.mail || profile.userPrincipalName,
      nickName: profile.userPrincipalName,
      location: profile.officeLocation ?? '',
      // Graph serves the photo bytes; callers fetch it with the access token
      avatarUrl: MICROSOFT_GRAPH_PHOTO_URL,
    }
  }
}
