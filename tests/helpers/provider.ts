import type { OAuth2ProviderOptions } from '../../src/oauth2/provider.ts'
import { OAuth2Session } from '../../src/oauth2/session.ts'

export const providerOptions = (id: string): OAuth2ProviderOptions => ({
  clientKey: 'test-client-id',
  secret: 'test-secret',
  callbackUrl: `https://app.example.com/auth/${id}/callback`,
})

/** A session that has already been through the callback. */
export const authorizedSession = (accessToken = 'access-1'): OAuth2Session =>
  new OAuth2Session({ accessToken, refreshToken: 'refresh-1' })

export const callbackParams = (params: Record<string, string>) =>
  new URLSearchParams(params)
