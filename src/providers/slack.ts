import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const SLACK_AUTH_URL = 'https://slack.com/oauth/authorize'
export const SLACK_TOKEN_URL = 'https://slack.com/api/oauth.access'
export const SLACK_AUTH_TEST_URL = 'https://slack.com/api/auth.test'
export const SLACK_USERS_INFO_URL = 'https://slack.com/api/users.info'

export const SLACK_SCOPE_USERS_READ = 'users:read'

interface SlackResponse {
  ok?: boolean
  error?: string
}

interface SlackAuthTest extends SlackResponse {
  user_id?: string
  user?: string
  team?: string
  team_id?: string
}

interface SlackUsersInfo extends SlackResponse {
  user?: {
    id?: string
    name?: string
    profile?: {
      email?: string
      real_name?: string
      image_32?: string
      first_name?: string
      last_name?: string
    }
  }
}

export class SlackProvider extends OAuth2Provider {
  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'slack',
        endpoint: { authUrl: SLACK_AUTH_URL, tokenUrl: SLACK_TOKEN_URL },
        defaultScopes: [SLACK_SCOPE_USERS_READ],
      },
      options,
    )
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const headers = bearer(session.accessToken)
    const identity = this.assertOk(
      await getJson<SlackAuthTest>(SLACK_AUTH_TEST_URL, {
        ...this.requestContext(),
        headers,
      }),
    )
    const fields: UserFields = {
      rawData: toRawData(identity),
      userId: identity.user_id,
      nickName: identity.user,
    }
    if (!this.scopes.includes(SLACK_SCOPE_USERS_READ) || !identity.user_id) {
      return fields
    }

    const url = new URL(SLACK_USERS_INFO_URL)
    url.searchParams.set('user', identity.user_id)
    const info = this.assertOk(
      await getJson<SlackUsersInfo>(url, { ...this.requestContext(), headers }),
    )
    const profile = info.user?.profile
    return {
      rawData: toRawData(info),
      userId: info.user?.id ?? identity.user_id,
      nickName: info.user?.name ?? identity.user,
      email: profile?.email,
      name: profile?.real_name,
      avatarUrl: profile?.image_32,
      firstName: profile?.first_name,
      lastName: profile?.last_name,
    }
  }

  /** Slack reports failures in the body with a 200 status. */
  private assertOk<T extends SlackResponse>(response: T): T {
    if (response.ok === false) {
      throw new Error(
        `${this.providerName} responded with an error trying to fetch user information: ${response.error ?? 'unknown'}`,
      )
    }
    return response
  }
}
