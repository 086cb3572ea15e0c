export interface ProviderCredentials {
  clientKey: string
  secret: string
  callbackUrl: string
  isConfigured: boolean
}

const DEFAULT_PORT = 3000

/** Env var prefix for a provider id: `openid-connect` -> `OPENID_CONNECT`. */
export const envPrefix = (providerId: string): string =>
  providerId.toUpperCase().replace(/[^A-Z0-9]/g, '_')

export const getCallbackBaseUrl = (): string => {
  const configured = process.env.AUTH_CALLBACK_BASE_URL?.trim()
  if (configured) {
    return configured.replace(/\/+$/, '')
  }
  return `http://localhost:${process.env.PORT || DEFAULT_PORT}`
}

export const getCallbackUrl = (providerId: string): string =>
  `${getCallbackBaseUrl()}/auth/${providerId}/callback`

/**
 * Credentials for one provider from `<ID>_KEY` / `<ID>_SECRET`. Providers
 * that sign with an API key alone (Steam) only need the key.
 */
export const getProviderCredentials = (
  providerId: string,
  options: { keyOnly?: boolean } = {},
): ProviderCredentials => {
  const prefix = envPrefix(providerId)
  const clientKey = process.env[`${prefix}_KEY`]?.trim() ?? ''
  const secret = process.env[`${prefix}_SECRET`]?.trim() ?? ''
  return {
    clientKey,
    secret,
    callbackUrl: getCallbackUrl(providerId),
    isConfigured:
      clientKey.length > 0 && (options.keyOnly === true || secret.length > 0),
  }
}

/** Optional per-provider setting, e.g. `AUTH0_DOMAIN`. */
export const getProviderSetting = (
  providerId: string,
  setting: string,
): string | undefined => {
  const value = process.env[`${envPrefix(providerId)}_${setting}`]?.trim()
  return value ? value : undefined
}

/** `<ID>_SCOPES`, space or comma separated. */
export const getProviderScopes = (providerId: string): string[] | undefined => {
  const raw = getProviderSetting(providerId, 'SCOPES')
  if (!raw) {
    return undefined
  }
  return raw.split(/[\s,]+/).filter((scope) => scope.length > 0)
}
