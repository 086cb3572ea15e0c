import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, requestJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const DROPBOX_AUTH_URL = 'https://www.dropbox.com/oauth2/authorize'
export const DROPBOX_TOKEN_URL = 'https://api.dropboxapi.com/oauth2/token'
export const DROPBOX_ACCOUNT_URL =
  'https://api.dropboxapi.com/2/users/get_current_account'

interface DropboxAccount {
  account_id?: string
  email?: string
  country?: string
  profile_photo_url?: string
  name?: {
    display_name?: string
    familiar_name?: string
    given_name?: string
    surname?: string
  }
}

export class DropboxProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'dropbox',
        endpoint: { authUrl: DROPBOX_AUTH_URL, tokenUrl: DROPBOX_TOKEN_URL },
      },
      options,
    )
  }

  /** Dropbox only returns a refresh token for offline access. */
  protected authCodeParams(): Record<string, string> {
    return { token_access_type: 'offline' }
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const account = await requestJson<DropboxAccount>(
      DROPBOX_ACCOUNT_URL,
      { method: 'POST', headers: bearer(session.accessToken) },
      this.requestContext(),
    )
    return {
      rawData: toRawData(account),
      userId: account.account_id,
      email: account.email,
      name: account.name?.display_name,
      nickName: account.name?.familiar_name,
      firstName: account.name?.given_name,
      lastName: account.name?.surname,
      avatarUrl: account.profile_photo_url,
      location: account.country,
    }
  }
}
