import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const DISCORD_AUTH_URL = 'https://discord.com/api/oauth2/authorize'
export const DISCORD_TOKEN_URL = 'https://discord.com/api/oauth2/token'
export const DISCORD_USER_URL = 'https://discord.com/api/users/@me'

export const DiscordScope = {
  identify: 'identify',
  email: 'email',
  connections: 'connections',
  guilds: 'guilds',
  joinGuild: 'guilds.join',
  groupDMJoin: 'gdm.join',
  bot: 'bot',
  webhook: 'webhook.incoming',
  readGuildMembers: 'guilds.members.read',
} as const

interface DiscordUser {
  id?: string
  username?: string
  global_name?: string | null
  email?: string | null
  avatar?: string | null
  verified?: boolean
}

export class DiscordProvider extends OAuth2Provider {
  /** `none` skips the consent screen for returning users. */
  prompt = 'none'
  /** Bot permissions integer, sent when the `bot` scope is requested. */
  permissions = ''

  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'discord',
        endpoint: { authUrl: DISCORD_AUTH_URL, tokenUrl: DISCORD_TOKEN_URL },
        defaultScopes: [DiscordScope.identify],
      },
      options,
    )
  }

  setPrompt(prompt: string): void {
    this.prompt = prompt
  }

  setPermissions(permissions: string): void {
    this.permissions = permissions
  }

  protected authCodeParams(): Record<string, string> {
    const params: Record<string, string> = {}
    if (this.prompt) {
      params.prompt = this.prompt
    }
    if (this.permissions) {
      params.permissions = this.permissions
    }
    return params
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const profile = await getJson<DiscordUser>(DISCORD_USER_URL, {
      ...this.requestContext(),
      headers: { Accept: 'application/json', ...bearer(session.accessToken) },
    })
    return {
      rawData: toRawData(profile),
      name: profile.username,
      nickName: profile.global_name ?? '',
      email: profile.email ?? '',
      userId: profile.id,
      avatarUrl: discordAvatarUrl(profile.id, profile.avatar),
    }
  }
}

/** Animated avatars have a hash prefixed with `a_`. */
export const discordAvatarUrl = (
  userId: string | undefined,
  avatar: string | null | undefined,
): string => {
  if (!userId || !avatar) {
    return ''
  }
  const extension = avatar.startsWith('a_') ? '.gif' : '.jpg'
  return `https://media.discordapp.net/avatars/${userId}/${avatar}${extension}`
}
