import { describe, expect, it } from 'vitest'
import { FauxProvider } from '../../providers/faux.ts'
import { OAuth2Session } from '../session.ts'

describe('OAuth2Session', () => {
  it('should throw when no auth URL has been set', () => {
    expect(() => new OAuth2Session().getAuthUrl()).toThrow(
      'an AuthURL has not been set',
    )
  })

  it('should marshal dates as ISO strings', () => {
    const session = new OAuth2Session({
      authUrl: 'https://idp.example.com/authorize',
      accessToken: 'access-1',
      expiresAt: new Date('2026-03-01T10:00:00.000Z'),
      extra: { instance_url: 'https://example.my.salesforce.com' },
    })

    expect(JSON.parse(session.marshal())).toEqual({
      authUrl: 'https://idp.example.com/authorize',
      accessToken: 'access-1',
      refreshToken: '',
      expiresAt: '2026-03-01T10:00:00.000Z',
      idToken: '',
      codeVerifier: '',
      extra: { instance_url: 'https://example.my.salesforce.com' },
    })
  })

  it('should restore a marshaled session', () => {
    const original = new OAuth2Session({
      authUrl: 'https://idp.example.com/authorize',
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: new Date('2026-03-01T10:00:00.000Z'),
      idToken: 'id-1',
      codeVerifier: 'verifier-1',
    })

    const restored = OAuth2Session.fromJSON(original.marshal())

    expect(restored.accessToken).toBe('access-1')
    expect(restored.refreshToken).toBe('refresh-1')
    expect(restored.expiresAt?.toISOString()).toBe('2026-03-01T10:00:00.000Z')
    expect(restored.idToken).toBe('id-1')
    expect(restored.codeVerifier).toBe('verifier-1')
  })

  it('should throw on malformed session data', () => {
    expect(() => OAuth2Session.fromJSON('not json')).toThrow()
    expect(() => OAuth2Session.fromJSON('[]')).toThrow(
      'session data must be a JSON object',
    )
  })

  it('should refuse providers that cannot exchange codes', async () => {
    await expect(
      new OAuth2Session().authorize(new FauxProvider(), new URLSearchParams()),
    ).rejects.toThrow('faux cannot authorize an OAuth2 session')
  })
})
