import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { idString, toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const GITLAB_DEFAULT_BASE_URL = 'https://gitlab.com'

export interface GitLabProviderOptions extends OAuth2ProviderOptions {
  /** Self-managed instance, e.g. `https://gitlab.example.com`. */
  baseUrl?: string
}

interface GitLabUser {
  id?: number
  username?: string
  name?: string
  email?: string
  avatar_url?: string
  location?: string
  bio?: string
}

export class GitLabProvider extends OAuth2Provider {
  readonly baseUrl: string

  constructor(options: GitLabProviderOptions) {
    const baseUrl = (options.baseUrl ?? GITLAB_DEFAULT_BASE_URL).replace(/\/+$/, '')
    super(
      {
        name: 'gitlab',
        endpoint: {
          authUrl: `${baseUrl}/oauth/authorize`,
          tokenUrl: `${baseUrl}/oauth/token`,
        },
        defaultScopes: ['read_user'],
      },
      options,
    )
    this.baseUrl = baseUrl
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<GitLabUser>(`${this.baseUrl}/api/v4/user`, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(profile),
      name: profile.name,
      nickName: profile.username,
      email: profile.email,
      avatarUrl: profile.avatar_url,
      userId: idString(profile.id),
      location: profile.location,
      description: profile.bio,
    }
  }
}
