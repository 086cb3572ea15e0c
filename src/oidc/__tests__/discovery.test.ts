import { describe, expect, it, vi } from 'vitest'
import { jsonResponse } from '../../../tests/helpers/http.ts'
import { fetchDiscoveryDocument } from '../discovery.ts'

const DISCOVERY_URL = 'https://idp.example.com/.well-known/openid-configuration'

describe('fetchDiscoveryDocument', () => {
  it('should return the provider metadata', async () => {
    const metadata = {
      issuer: 'https://idp.example.com',
      authorization_endpoint: 'https://idp.example.com/authorize',
      token_endpoint: 'https://idp.example.com/token',
      userinfo_endpoint: 'https://idp.example.com/userinfo',
      jwks_uri: 'https://idp.example.com/jwks',
    }
    const client = vi.fn().mockResolvedValue(jsonResponse(metadata))

    const document = await fetchDiscoveryDocument(DISCOVERY_URL, {
      provider: 'openid-connect',
      client,
    })

    expect(document).toEqual(metadata)
    expect(client.mock.calls[0][0]).toBe(DISCOVERY_URL)
  })

  it('should reject metadata without the flow endpoints', async () => {
    const client = vi
      .fn()
      .mockResolvedValue(jsonResponse({ issuer: 'https://idp.example.com' }))

    await expect(fetchDiscoveryDocument(DISCOVERY_URL, {
      provider: 'openid-connect',
      client,
    })).rejects.toThrow(
      `discovery document at ${DISCOVERY_URL} is missing issuer, authorization_endpoint or token_endpoint`,
    )
  })

  it('should report a failed request', async () => {
    const client = vi.fn().mockResolvedValue(jsonResponse({}, 404))

    await expect(fetchDiscoveryDocument(DISCOVERY_URL, {
      provider: 'openid-connect',
      client,
    })).rejects.toThrow(
      'openid-connect responded with a 404 trying to fetch the discovery document',
    )
  })
})
