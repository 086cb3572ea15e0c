import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const HEROKU_AUTH_URL = 'https://id.heroku.com/oauth/authorize'
export const HEROKU_TOKEN_URL = 'https://id.heroku.com/oauth/token'
export const HEROKU_ACCOUNT_URL = 'https://api.heroku.com/account'

interface HerokuAccount {
  id?: string
  email?: string
  name?: string | null
}

export class HerokuProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'heroku',
        endpoint: { authUrl: HEROKU_AUTH_URL, tokenUrl: HEROKU_TOKEN_URL },
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const account = await getJson<HerokuAccount>(HEROKU_ACCOUNT_URL, {
      ...this.requestContext(),
      headers: {
        Accept: 'application/vnd.heroku+json; version=3',
        ...bearer(session.accessToken),
      },
    })
    return {
      rawData: toRawData(account),
      userId: account.id,
      email: account.email,
      name: account.name ?? '',
    }
  }
}
