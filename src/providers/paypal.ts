import type { Endpoint } from '../oauth2/config.ts'
import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export type PayPalEnvironment = 'sandbox' | 'production'

export interface PayPalProviderOptions extends OAuth2ProviderOptions {
  /** Defaults to PAYPAL_ENV, then production. */
  environment?: PayPalEnvironment
}

const PAYPAL_URLS = {
  production: {
    authUrl: 'https://www.paypal.com/signin/authorize',
    tokenUrl: 'https://api-m.paypal.com/v1/oauth2/token',
    profileUrl: 'https://api-m.paypal.com/v1/identity/oauth2/userinfo',
  },
  sandbox: {
    authUrl: 'https://www.sandbox.paypal.com/signin/authorize',
    tokenUrl: 'https://api-m.sandbox.paypal.com/v1/oauth2/token',
    profileUrl: 'https://api-m.sandbox.paypal.com/v1/identity/oauth2/userinfo',
  },
} as const

export const getPayPalEnvironment = (): PayPalEnvironment =>
  process.env.PAYPAL_ENV?.trim() === 'sandbox' ? 'sandbox' : 'production'

interface PayPalUserInfo {
  user_id?: string
  name?: string
  given_name?: string
  family_name?: string
  email?: string
  emails?: Array<{ value?: string; primary?: boolean }>
  address?: { locality?: string }
}

export class PayPalProvider extends OAuth2Provider {
  readonly environment: PayPalEnvironment
  private readonly profileUrl: string

  constructor(options: PayPalProviderOptions) {
    const environment = options.environment ?? getPayPalEnvironment()
    const urls = PAYPAL_URLS[environment]
    const endpoint: Endpoint = {
      authUrl: urls.authUrl,
      tokenUrl: urls.tokenUrl,
      authStyle: 'header',
    }
    super(
      {
        name: 'paypal',
        endpoint,
        defaultScopes: ['openid', 'profile', 'email'],
      },
      options,
    )
    this.environment = environment
    this.profileUrl = urls.profileUrl
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const url = new URL(this.profileUrl)
    url.searchParams.set('schema', 'openid')
    const info = await getJson<PayPalUserInfo>(url, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    const primaryEmail =
      info.emails?.find((entry) => entry.primary)?.value ?? info.emails?.[0]?.value
    return {
      rawData: toRawData(info),
      userId: info.user_id,
      name: info.name,
      firstName: info.given_name,
      lastName: info.family_name,
      email: info.email ?? primaryEmail,
      location: info.address?.locality,
    }
  }
}
