import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { parseJwt } from '../tokens/jwt.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const LINE_AUTH_URL = 'https://access.line.me/oauth2/v2.1/authorize'
export const LINE_TOKEN_URL = 'https://api.line.me/oauth2/v2.1/token'
export const LINE_PROFILE_URL = 'https://api.line.me/v2/profile'

/** `normal` or `aggressive`; offers to add the LINE official account. */
export type LineBotPrompt = 'normal' | 'aggressive'

interface LineProfile {
  userId?: string
  displayName?: string
  pictureUrl?: string
  statusMessage?: string
}

/** Read the email claim of a LINE ID token; '' when absent. */
export const emailFromIdToken = (idToken: string): string => {
  if (!idToken) {
    return ''
  }
  const { payload } = parseJwt(idToken)
  return typeof payload.email === 'string' ? payload.email : ''
}

export class LineProvider extends OAuth2Provider {
  private botPrompt = ''

  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'line',
        endpoint: { authUrl: LINE_AUTH_URL, tokenUrl: LINE_TOKEN_URL },
        defaultScopes: ['profile', 'openid', 'email'],
      },
      options,
    )
  }

  setBotPrompt(botPrompt: LineBotPrompt | ''): void {
    this.botPrompt = botPrompt
  }

  protected authCodeParams(): Record<string, string> {
    return this.botPrompt ? { bot_prompt: this.botPrompt } : {}
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<LineProfile>(LINE_PROFILE_URL, {
      ...this.requestContext(),
      headers: bearer(session.accessToken),
    })
    return {
      rawData: toRawData(profile),
      userId: profile.userId,
      name: profile.displayName,
      nickName: profile.displayName,
      avatarUrl: profile.pictureUrl,
      description: profile.statusMessage,
      email: emailFromIdToken(session.idToken),
    }
  }
}
