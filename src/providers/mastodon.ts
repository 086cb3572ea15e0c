import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const MASTODON_DEFAULT_INSTANCE_URL = 'https://mastodon.social'

export interface MastodonProviderOptions extends OAuth2ProviderOptions {
  instanceUrl?: string
}

interface MastodonAccount {
  id?: string
  username?: string
  acct?: string
  display_name?: string
  note?: string
  avatar?: string
  url?: string
}

export class MastodonProvider extends OAuth2Provider {
  readonly instanceUrl: string

  constructor(options: MastodonProviderOptions) {
    const instanceUrl = (
      options.instanceUrl ?? MASTODON_DEFAULT_INSTANCE_URL
    ).replace(/\/+$/, '')
    super(
      {
        name: 'mastodon',
        endpoint: {
          authUrl: `${instanceUrl}/oauth/authorize`,
          tokenUrl: `${instanceUrl}/oauth/token`,
        },
        defaultScopes: ['read:accounts'],
      },
      options,
    )
    this.instanceUrl = instanceUrl
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const account = await getJson<MastodonAccount>(
      `${this.instanceUrl}/api/v1/accounts/verify_credentials`,
      { ...this.requestContext(), headers: bearer(session.accessToken) },
    )
    return {
      rawData: toRawData(account),
      userId: account.id,
      nickName: account.username,
      name: account.display_name,
      description: account.note,
      avatarUrl: account.avatar,
    }
  }
}
