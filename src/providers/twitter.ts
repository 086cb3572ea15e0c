import type { AccessToken } from '../oauth1/consumer.ts'
import {
  OAuth1Provider,
  type OAuth1ProviderOptions,
} from '../oauth1/provider.ts'
import { toRawData } from './profile.ts'
import type { UserFields } from './types/user.ts'

export const TWITTER_REQUEST_TOKEN_URL =
  'https://api.twitter.com/oauth/request_token'
export const TWITTER_AUTHORIZE_URL = 'https://api.twitter.com/oauth/authorize'
export const TWITTER_AUTHENTICATE_URL =
  'https://api.twitter.com/oauth/authenticate'
export const TWITTER_ACCESS_TOKEN_URL =
  'https://api.twitter.com/oauth/access_token'
export const TWITTER_PROFILE_URL =
  'https://api.twitter.com/1.1/account/verify_credentials.json'

interface TwitterProfile {
  id_str?: string
  name?: string
  screen_name?: string
  description?: string
  profile_image_url?: string
  profile_image_url_https?: string
  location?: string
  email?: string
}

export interface TwitterProviderOptions extends OAuth1ProviderOptions {
  /**
   * Send users to `oauth/authenticate`, which skips the consent screen for
   * users who already authorized the app.
   */
  authenticate?: boolean
  /** Ask verify_credentials for the email; needs the elevated permission. */
  includeEmail?: boolean
}

/**
 * Twitter (X) OAuth 1.0a sign-in. For the OAuth2 flow see TwitterV2Provider.
 */
export class TwitterProvider extends OAuth1Provider {
  private readonly includeEmail: boolean

  constructor(options: TwitterProviderOptions) {
    super(
      'twitter',
      {
        serviceProvider: {
          requestTokenUrl: TWITTER_REQUEST_TOKEN_URL,
          authorizeTokenUrl: options.authenticate
            ? TWITTER_AUTHENTICATE_URL
            : TWITTER_AUTHORIZE_URL,
          accessTokenUrl: TWITTER_ACCESS_TOKEN_URL,
        },
      },
      options,
    )
    this.includeEmail = options.includeEmail ?? false
  }

  protected async fetchProfile(accessToken: AccessToken): Promise<UserFields> {
    const params: Record<string, string> = {
      include_entities: 'false',
      skip_status: 'true',
    }
    if (this.includeEmail) {
      params.include_email = 'true'
    }
    const profile = await this.signedGetJson<TwitterProfile>(
      TWITTER_PROFILE_URL,
      params,
      accessToken,
    )

    return {
      rawData: toRawData(profile),
      userId: profile.id_str ?? '',
      name: profile.name ?? '',
      nickName: profile.screen_name ?? '',
      description: profile.description ?? '',
      avatarUrl: profile.profile_image_url_https ?? profile.profile_image_url ?? '',
      location: profile.location ?? '',
      email: profile.email ?? '',
    }
  }
}
