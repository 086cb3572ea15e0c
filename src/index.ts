export type { Params, Provider, Session } from './providers/types/provider.ts'
export { NO_AUTH_URL_ERROR_MESSAGE } from './providers/types/provider.ts'
export { createUser } from './providers/types/user.ts'
export type { User, UserFields } from './providers/types/user.ts'
export {
  clearProviders,
  deleteProvider,
  getProvider,
  getProviders,
  useProviders,
} from './providers/registry.ts'
export {
  SUPPORTED_PROVIDER_IDS,
  useProvidersFromEnv,
} from './providers/from-env.ts'
export {
  getCallbackUrl,
  getProviderCredentials,
} from './providers/provider-config.ts'

export type { HttpClient } from './plumbing/http.ts'
export { log } from './plumbing/logger.ts'

export { OAuth2Config, parseTokenResponse } from './oauth2/config.ts'
export type { AuthStyle, Endpoint } from './oauth2/config.ts'
export { generateCodeChallenge, generateCodeVerifier } from './oauth2/pkce.ts'
export { OAuth2Provider } from './oauth2/provider.ts'
export type {
  OAuth2ProviderDefinition,
  OAuth2ProviderOptions,
} from './oauth2/provider.ts'
export { OAuth2Session } from './oauth2/session.ts'
export { isTokenValid } from './oauth2/token.ts'
export type { Token } from './oauth2/token.ts'

export { Consumer } from './oauth1/consumer.ts'
export type { AccessToken, RequestToken } from './oauth1/consumer.ts'
export { OAuth1Provider } from './oauth1/provider.ts'
export type { OAuth1ProviderOptions } from './oauth1/provider.ts'
export { OAuth1Session } from './oauth1/session.ts'

export { parseJwt, signJwt, verifyJwt } from './tokens/jwt.ts'
export { clearJwksCache, getPublicKeyByKid } from './tokens/jwks.ts'
export { verifyIdToken } from './tokens/id-token.ts'

export { AmazonProvider } from './providers/amazon.ts'
export { AppleProvider, makeSecret } from './providers/apple.ts'
export { Auth0Provider } from './providers/auth0.ts'
export { AzureADV2Provider } from './providers/azureadv2.ts'
export { BitbucketProvider } from './providers/bitbucket.ts'
export { BoxProvider } from './providers/box.ts'
export { DeezerProvider } from './providers/deezer.ts'
export { DigitalOceanProvider } from './providers/digitalocean.ts'
export { DiscordProvider } from './providers/discord.ts'
export { DropboxProvider } from './providers/dropbox.ts'
export { FacebookProvider } from './providers/facebook.ts'
export { FauxProvider, FauxSession } from './providers/faux.ts'
export { FitbitProvider } from './providers/fitbit.ts'
export { GiteaProvider } from './providers/gitea.ts'
export { GitHubProvider } from './providers/github.ts'
export { GitLabProvider } from './providers/gitlab.ts'
export { GoogleProvider } from './providers/google.ts'
export { HerokuProvider } from './providers/heroku.ts'
export { InstagramProvider } from './providers/instagram.ts'
export { LastFMProvider, LastFMSession } from './providers/lastfm.ts'
export { LineProvider } from './providers/line.ts'
export { LinkedInProvider } from './providers/linkedin.ts'
export { MastodonProvider } from './providers/mastodon.ts'
export { MicrosoftOnlineProvider } from './providers/microsoftonline.ts'
export { OktaProvider } from './providers/okta.ts'
export { OpenIDConnectProvider } from './providers/openid-connect.ts'
export { PatreonProvider } from './providers/patreon.ts'
export { PayPalProvider } from './providers/paypal.ts'
export { RedditProvider } from './providers/reddit.ts'
export { SalesforceProvider } from './providers/salesforce.ts'
export { ShopifyProvider } from './providers/shopify.ts'
export { SlackProvider } from './providers/slack.ts'
export { SpotifyProvider } from './providers/spotify.ts'
export { SteamProvider, SteamSession } from './providers/steam.ts'
export { StravaProvider } from './providers/strava.ts'
export { TumblrProvider } from './providers/tumblr.ts'
export { TwitchProvider } from './providers/twitch.ts'
export { TwitterProvider } from './providers/twitter.ts'
export { TwitterV2Provider } from './providers/twitterv2.ts'
export { VKProvider } from './providers/vk.ts'
export { XeroProvider } from './providers/xero.ts'
export { YandexProvider } from './providers/yandex.ts'
export { ZoomProvider } from './providers/zoom.ts'

export { getAuthConfig } from './auth/auth-config.ts'
export type { AuthConfig } from './auth/auth-config.ts'
export { createCookieSessionStore } from './auth/session-store.ts'
export type { SessionStore } from './auth/session-store.ts'
export {
  createCassandraSessionStore,
  createSessionStore,
} from './auth/cassandra-session-store.ts'
export {
  beginAuthHandler,
  completeUserAuth,
  getAuthUrl,
  getFromSession,
  logout,
  storeInSession,
} from './auth/handlers.ts'
export { getProviderName, setState } from './auth/auth-utils.ts'
export { createAuthRoutes } from './auth/routes.ts'
export type { AuthRoutesOptions } from './auth/routes.ts'
