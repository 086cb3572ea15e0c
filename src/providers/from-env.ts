import type { OAuth2ProviderOptions } from '../oauth2/provider.ts'
import { log } from '../plumbing/logger.ts'
import { AmazonProvider } from './amazon.ts'
import { AppleProvider } from './apple.ts'
import { Auth0Provider } from './auth0.ts'
import { AzureADV2Provider } from './azureadv2.ts'
import { BitbucketProvider } from './bitbucket.ts'
import { BoxProvider } from './box.ts'
import { DeezerProvider } from './deezer.ts'
import { DigitalOceanProvider } from './digitalocean.ts'
import { DiscordProvider } from './discord.ts'
import { DropboxProvider } from './dropbox.ts'
import { FacebookProvider } from './facebook.ts'
import { FitbitProvider } from './fitbit.ts'
import { GiteaProvider } from './gitea.ts'
import { GitHubProvider } from './github.ts'
import { GitLabProvider } from './gitlab.ts'
import { GoogleProvider } from './google.ts'
import { HerokuProvider } from './heroku.ts'
import { InstagramProvider } from './instagram.ts'
import { LastFMProvider } from './lastfm.ts'
import { LineProvider } from './line.ts'
import { LinkedInProvider } from './linkedin.ts'
import { MastodonProvider } from './mastodon.ts'
import { MicrosoftOnlineProvider } from './microsoftonline.ts'
import { OktaProvider } from './okta.ts'
import { OpenIDConnectProvider } from './openid-connect.ts'
import { PatreonProvider } from './patreon.ts'
import { PayPalProvider } from './paypal.ts'
import {
  getProviderCredentials,
  getProviderScopes,
  getProviderSetting,
} from './provider-config.ts'
import { RedditProvider } from './reddit.ts'
import { useProviders } from './registry.ts'
import { SalesforceProvider } from './salesforce.ts'
import { ShopifyProvider } from './shopify.ts'
import { SlackProvider } from './slack.ts'
import { SpotifyProvider } from './spotify.ts'
import { SteamProvider } from './steam.ts'
import { StravaProvider } from './strava.ts'
import { TumblrProvider } from './tumblr.ts'
import { TwitchProvider } from './twitch.ts'
import { TwitterProvider } from './twitter.ts'
import { TwitterV2Provider } from './twitterv2.ts'
import type { Provider } from './types/provider.ts'
import { VKProvider } from './vk.ts'
import { XeroProvider } from './xero.ts'
import { YandexProvider } from './yandex.ts'
import { ZoomProvider } from './zoom.ts'

type ProviderFactory = (
  options: OAuth2ProviderOptions,
  setting: (name: string) => string | undefined,
) => Provider | Promise<Provider> | undefined

/**
 * Providers that can be configured from `<ID>_KEY` / `<ID>_SECRET` alone,
 * plus the optional settings each one reads.
 */
const FACTORIES: Record<string, ProviderFactory> = {
  amazon: (options) => new AmazonProvider(options),
  apple: (options) => new AppleProvider(options),
  auth0: (options, setting) => {
    const domain = setting('DOMAIN')
    return domain ? new Auth0Provider({ ...options, domain }) : undefined
  },
  azureadv2: (options, setting) =>
    new AzureADV2Provider({ ...options, tenant: setting('TENANT') }),
  bitbucket: (options) => new BitbucketProvider(options),
  box: (options) => new BoxProvider(options),
  deezer: (options) => new DeezerProvider(options),
  digitalocean: (options) => new DigitalOceanProvider(options),
  discord: (options) => new DiscordProvider(options),
  dropbox: (options) => new DropboxProvider(options),
  facebook: (options) => new FacebookProvider(options),
  fitbit: (options) => new FitbitProvider(options),
  gitea: (options, setting) =>
    new GiteaProvider({ ...options, baseUrl: setting('URL') }),
  github: (options) => new GitHubProvider(options),
  gitlab: (options, setting) =>
    new GitLabProvider({ ...options, baseUrl: setting('URL') }),
  google: (options) => new GoogleProvider(options),
  heroku: (options) => new HerokuProvider(options),
  instagram: (options) => new InstagramProvider(options),
  lastfm: (options) => new LastFMProvider(options),
  line: (options) => new LineProvider(options),
  linkedin: (options) => new LinkedInProvider(options),
  mastodon: (options, setting) =>
    new MastodonProvider({ ...options, instanceUrl: setting('URL') }),
  microsoftonline: (options) => new MicrosoftOnlineProvider(options),
  okta: (options, setting) => {
    const orgUrl = setting('ORG_URL')
    return orgUrl
      ? new OktaProvider({ ...options, orgUrl, issuerUrl: setting('ISSUER_URL') })
      : undefined
  },
  'openid-connect': (options, setting) => {
    const discoveryUrl = setting('DISCOVERY_URL')
    return discoveryUrl
      ? OpenIDConnectProvider.discover({ ...options, discoveryUrl })
      : undefined
  },
  patreon: (options) => new PatreonProvider(options),
  paypal: (options) => new PayPalProvider(options),
  reddit: (options, setting) =>
    new RedditProvider({ ...options, userAgent: setting('USER_AGENT') }),
  salesforce: (options) => new SalesforceProvider(options),
  shopify: (options, setting) =>
    new ShopifyProvider({ ...options, shopName: setting('SHOP_NAME') }),
  slack: (options) => new SlackProvider(options),
  spotify: (options) => new SpotifyProvider(options),
  strava: (options) => new StravaProvider(options),
  tumblr: (options) => new TumblrProvider(options),
  twitch: (options) => new TwitchProvider(options),
  twitter: (options, setting) =>
    new TwitterProvider({
      ...options,
      authenticate: setting('AUTHENTICATE') === 'true',
    }),
  twitterv2: (options) => new TwitterV2Provider(options),
  vk: (options) => new VKProvider(options),
  xero: (options) => new XeroProvider(options),
  yandex: (options) => new YandexProvider(options),
  zoom: (options) => new ZoomProvider(options),
}

/** Steam authenticates with a Web API key and has no client secret. */
const createSteamProvider = (): Provider | undefined => {
  const { clientKey, callbackUrl, isConfigured } = getProviderCredentials(
    'steam',
    { keyOnly: true },
  )
  return isConfigured
    ? new SteamProvider({ apiKey: clientKey, callbackUrl })
    : undefined
}

export const SUPPORTED_PROVIDER_IDS: readonly string[] = [
  ...Object.keys(FACTORIES),
  'steam',
].sort()

/**
 * Register every provider whose credentials are present in the
 * environment. Returns the registered names.
 */
export const useProvidersFromEnv = async (): Promise<string[]> => {
  const providers: Provider[] = []

  for (const [id, factory] of Object.entries(FACTORIES)) {
    const { clientKey, secret, callbackUrl, isConfigured } =
      getProviderCredentials(id)
    if (!isConfigured) {
      continue
    }
    try {
      const provider = await factory(
        { clientKey, secret, callbackUrl, scopes: getProviderScopes(id) },
        (name) => getProviderSetting(id, name),
      )
      if (provider) {
        providers.push(provider)
      } else {
        log({ message: 'Provider is missing required settings', provider: id })
      }
    } catch (error) {
      log({
        message: 'Failed to configure provider',
        provider: id,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  const steam = createSteamProvider()
  if (steam) {
    providers.push(steam)
  }

  useProviders(...providers)
  return providers.map((provider) => provider.name())
}
