import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const DIGITALOCEAN_AUTH_URL =
  'https://cloud.digitalocean.com/v1/oauth/authorize'
export const DIGITALOCEAN_TOKEN_URL =
  'https://cloud.digitalocean.com/v1/oauth/token'
export const DIGITALOCEAN_ACCOUNT_URL = 'https://api.digitalocean.com/v2/account'

interface DigitalOceanAccount {
  account?: {
    uuid?: string
    email?: string
    email_verified?: boolean
    status?: string
    droplet_limit?: number
  }
}

export class DigitalOceanProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'digitalocean',
        endpoint: {
          authUrl: DIGITALOCEAN_AUTH_URL,
          tokenUrl: DIGITALOCEAN_TOKEN_URL,
        },
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const data = await getJson<DigitalOceanAccount>(DIGITALOCEAN_ACCOUNT_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(data),
      email: data.account?.email,
      userId: data.account?.uuid,
    }
  }
}
