import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { idString, toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const GITEA_DEFAULT_BASE_URL = 'https://gitea.com'

export interface GiteaProviderOptions extends OAuth2ProviderOptions {
  /** Self-hosted instance, e.g. `https://git.example.com`. */
  baseUrl?: string
}

interface GiteaUser {
  id?: number
  login?: string
  full_name?: string
  email?: string
  avatar_url?: string
  location?: string
  description?: string
}

export class GiteaProvider extends OAuth2Provider {
  readonly baseUrl: string

  constructor(options: GiteaProviderOptions) {
    const baseUrl = (options.baseUrl ?? GITEA_DEFAULT_BASE_URL).replace(/\/+$/, '')
    super(
      {
        name: 'gitea',
        endpoint: {
          authUrl: `${baseUrl}/login/oauth/authorize`,
          tokenUrl: `${baseUrl}/login/oauth/access_token`,
        },
      },
      options,
    )
    this.baseUrl = baseUrl
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<GiteaUser>(`${this.baseUrl}/api/v1/user`, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(profile),
      name: profile.full_name,
      nickName: profile.login,
      email: profile.email,
      avatarUrl: profile.avatar_url,
      userId: idString(profile.id),
      location: profile.location,
      description: profile.description,
    }
  }
}
