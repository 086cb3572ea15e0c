import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const AZURE_AD_V2_GRAPH_ME_URL = 'https://graph.microsoft.com/v1.0/me'

/** `common`, `organizations`, `consumers` or a tenant id. */
export type AzureADTenant = string

export interface AzureADV2ProviderOptions extends OAuth2ProviderOptions {
  tenant?: AzureADTenant
}

interface GraphUser {
  id?: string
  displayName?: string
  givenName?: string
  surname?: string
  mail?: string | null
  userPrincipalName?: string
  jobTitle?: string | null
  officeLocation?: string | null
}

export const azureADV2Endpoint = (tenant: AzureADTenant) => ({
  authUrl: `https://login.microsoftonline.com/${tenant}/oauth2/v2.0/authorize`,
  tokenUrl: `https://login.microsoftonline.com/${tenant}/oauth2/v2.0/token`,
})

/**
 * Microsoft identity platform (v2.0 endpoints) with profile data from
 * Microsoft Graph.
 */
export class AzureADV2Provider extends OAuth2Provider {
  readonly tenant: AzureADTenant

  constructor(options: AzureADV2ProviderOptions) {
    const tenant = options.tenant || 'common'
    super(
      {
        name: 'azureadv2',
        endpoint: azureADV2Endpoint(tenant),
        requiredScopes: ['openid', 'profile', 'email', 'offline_access'],
        defaultScopes: ['User.Read'],
      },
      options,
    )
    this.tenant = tenant
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<GraphUser>(AZURE_AD_V2_GRAPH_ME_URL, {
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
      description: profile.jobTitle ?? '',
      location: profile.officeLocation ?? '',
    }
  }
}
