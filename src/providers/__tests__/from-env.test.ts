import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { log } from '../../plumbing/logger.ts'
import { GitHubProvider } from '../github.ts'
import { envPrefix } from '../provider-config.ts'
import { SUPPORTED_PROVIDER_IDS, useProvidersFromEnv } from '../from-env.ts'
import { clearProviders, getProvider, getProviders } from '../registry.ts'
import { SteamProvider } from '../steam.ts'

vi.mock('../../plumbing/logger.ts', () => ({ log: vi.fn() }))

describe('useProvidersFromEnv', () => {
  beforeEach(() => {
    clearProviders()
    vi.mocked(log).mockClear()
    for (const id of SUPPORTED_PROVIDER_IDS) {
      vi.stubEnv(`${envPrefix(id)}_KEY`, '')
      vi.stubEnv(`${envPrefix(id)}_SECRET`, '')
    }
    vi.stubEnv('AUTH_CALLBACK_BASE_URL', 'https://app.example.com')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    clearProviders()
  })

  it('should list every supported provider id in order', () => {
    expect(SUPPORTED_PROVIDER_IDS).toContain('github')
    expect(SUPPORTED_PROVIDER_IDS).toContain('steam')
    expect(SUPPORTED_PROVIDER_IDS).toContain('openid-connect')
    expect([...SUPPORTED_PROVIDER_IDS]).toEqual([...SUPPORTED_PROVIDER_IDS].sort())
  })

  it('should register providers with credentials in the environment', async () => {
    vi.stubEnv('GITHUB_KEY', 'test-client-id')
    vi.stubEnv('GITHUB_SECRET', 'test-secret')
    vi.stubEnv('GITHUB_SCOPES', 'read:user user:email')
    vi.stubEnv('STEAM_KEY', 'test-api-key')

    const names = await useProvidersFromEnv()

    expect(names).toEqual(['github', 'steam'])
    const github = getProvider('github')
    expect(github).toBeInstanceOf(GitHubProvider)
    if (github instanceof GitHubProvider) {
      expect(github.callbackUrl).toBe('https://app.example.com/auth/github/callback')
      expect(github.scopes).toEqual(['read:user', 'user:email'])
    }
    expect(getProvider('steam')).toBeInstanceOf(SteamProvider)
  })

  it('should skip providers missing a required setting', async () => {
    vi.stubEnv('AUTH0_KEY', 'test-client-id')
    vi.stubEnv('AUTH0_SECRET', 'test-secret')
    vi.stubEnv('AUTH0_DOMAIN', '')

    const names = await useProvidersFromEnv()

    expect(names).toEqual([])
    expect(getProviders().size).toBe(0)
    expect(log).toHaveBeenCalledWith({
      message: 'Provider is missing required settings',
      provider: 'auth0',
    })
  })

  it('should log providers that fail to configure and carry on', async () => {
    vi.stubEnv('XERO_KEY', 'test-client-id')
    vi.stubEnv('XERO_SECRET', 'test-secret')
    vi.stubEnv('XERO_METHOD', 'private')
    vi.stubEnv('XERO_PRIVATE_KEY_PATH', '')
    vi.stubEnv('BOX_KEY', 'test-client-id')
    vi.stubEnv('BOX_SECRET', 'test-secret')

    const names = await useProvidersFromEnv()

    expect(names).toEqual(['box'])
    expect(log).toHaveBeenCalledWith({
      message: 'Failed to configure provider',
      provider: 'xero',
      error: 'xero private and partner apps need a privateKey or XERO_PRIVATE_KEY_PATH',
    })
  })
})
