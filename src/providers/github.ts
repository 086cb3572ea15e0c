import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { idString, toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const GITHUB_AUTH_URL = 'https://github.com/login/oauth/authorize'
export const GITHUB_TOKEN_URL = 'https://github.com/login/oauth/access_token'
export const GITHUB_PROFILE_URL = 'https://api.github.com/user'
export const GITHUB_EMAIL_URL = 'https://api.github.com/user/emails'

export interface GitHubProviderOptions extends OAuth2ProviderOptions {
  /** GitHub Enterprise endpoints; github.com when omitted. */
  authUrl?: string
  tokenUrl?: string
  profileUrl?: string
  emailUrl?: string
}

interface GitHubProfile {
  id?: number
  login?: string
  name?: string | null
  email?: string | null
  bio?: string | null
  avatar_url?: string
  location?: string | null
}

interface GitHubEmail {
  email: string
  primary: boolean
  verified: boolean
}

const EMAIL_SCOPES = new Set(['user', 'user:email'])

export class GitHubProvider extends OAuth2Provider {
  readonly profileUrl: string
  readonly emailUrl: string

  constructor(options: GitHubProviderOptions) {
    super(
      {
        name: 'github',
        endpoint: {
          authUrl: options.authUrl ?? GITHUB_AUTH_URL,
          tokenUrl: options.tokenUrl ?? GITHUB_TOKEN_URL,
        },
      },
      options,
    )
    this.profileUrl = options.profileUrl ?? GITHUB_PROFILE_URL
    this.emailUrl = options.emailUrl ?? GITHUB_EMAIL_URL
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const headers = {
      Accept: 'application/vnd.github+json',
      ...bearer(session.accessToken),
    }
    const profile = await getJson<GitHubProfile>(this.profileUrl, {
      ...this.requestContext(),
      headers,
    })

    let email = profile.email ?? ''
    if (!email && this.scopes.some((scope) => EMAIL_SCOPES.has(scope))) {
      email = await this.fetchPrimaryEmail(headers)
    }

    return {
      rawData: toRawData(profile),
      name: profile.name ?? '',
      nickName: profile.login,
      email,
      description: profile.bio ?? '',
      avatarUrl: profile.avatar_url,
      userId: idString(profile.id),
      location: profile.location ?? '',
    }
  }

  private async fetchPrimaryEmail(
    headers: Record<string, string>,
  ): Promise<string> {
    const emails = await getJson<GitHubEmail[]>(this.emailUrl, {
      ...this.requestContext('fetch email addresses'),
      headers,
    })
    const primary = emails.find((entry) => entry.primary && entry.verified)
    return primary?.email ?? ''
  }
}
