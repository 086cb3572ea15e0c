import { afterEach, describe, expect, it, vi } from 'vitest'
import info from '../../../package.json' with { type: 'json' }
import { log } from '../logger.ts'

describe('log', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should wrap a plain message with the app name and version', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {})

    log('Auth service listening')

    expect(consoleLog).toHaveBeenCalledWith({
      message: 'Auth service listening',
      app: info.name,
      version: info.version,
    })
  })

  it('should keep structured fields', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {})

    log({ message: 'User authenticated', provider: 'github', attempt: 2 })

    expect(consoleLog).toHaveBeenCalledWith({
      message: 'User authenticated',
      provider: 'github',
      attempt: 2,
      app: 'multiauth',
      version: '0.1.0',
    })
  })

  it('should mask fields that look like credentials', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {})

    log({
      message: 'Token exchanged',
      accessToken: 'access-1',
      client_secret: 'test-secret',
      codeVerifier: 'verifier-1',
      provider: 'github',
    })

    expect(consoleLog).toHaveBeenCalledWith({
      message: 'Token exchanged',
      accessToken: '[redacted]',
      client_secret: '[redacted]',
      codeVerifier: '[redacted]',
      provider: 'github',
      app: 'multiauth',
      version: '0.1.0',
    })
  })
})
