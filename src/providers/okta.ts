import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export interface OktaProviderOptions extends OAuth2ProviderOptions {
  /** e.g. `https://example.okta.com` */
  orgUrl: string
  /** Authorization server; `<orgUrl>/oauth2/default` when omitted. */
  issuerUrl?: string
}

interface OktaUserInfo {
  sub?: string
  name?: string
  email?: string
  given_name?: string
  family_name?: string
  nickname?: string
  preferred_username?: string
  locale?: string
  zoneinfo?: string
  profile?: string
}

export class OktaProvider extends OAuth2Provider {
  readonly issuerUrl: string

  constructor(options: OktaProviderOptions) {
    const issuerUrl =
      options.issuerUrl ?? `${options.orgUrl.replace(/\/+$/, '')}/oauth2/default`
    super(
      {
        name: 'okta',
        endpoint: {
          authUrl: `${issuerUrl}/v1/authorize`,
          tokenUrl: `${issuerUrl}/v1/token`,
        },
        defaultScopes: ['openid', 'profile', 'email'],
      },
      options,
    )
    this.issuerUrl = issuerUrl
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const info = await getJson<OktaUserInfo>(`${this.issuerUrl}/v1/userinfo`, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(info),
      userId: info.sub,
      email: info.email,
      name: info.name,
      nickName: info.nickname ?? info.preferred_username,
      firstName: info.given_name,
      lastName: info.family_name,
    }
  }
}
