import { generateKeyPairSync } from 'node:crypto'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { jsonResponse } from '../../../tests/helpers/http.ts'
import type { HttpClient } from '../../plumbing/http.ts'
import { clearJwksCache, getJwks, getPublicKeyByKid, jwkToKeyObject } from '../jwks.ts'

const JWKS_URL = 'https://issuer.example.com/.well-known/jwks.json'

const contextWith = (client: HttpClient) => ({ provider: 'example', client })

const rsaKey = generateKeyPairSync('rsa', { modulusLength: 2048 }).publicKey
const ecKey = generateKeyPairSync('ec', { namedCurve: 'P-256' }).publicKey

const keySet = () => ({
  keys: [
    { ...rsaKey.export({ format: 'jwk' }), kid: 'rsa-1', use: 'sig' },
    { ...ecKey.export({ format: 'jwk' }), kid: 'ec-1', use: 'sig' },
    { kty: 'oct', kid: 'secret-1' },
    { ...rsaKey.export({ format: 'jwk' }) },
  ],
})

describe('jwkToKeyObject', () => {
  it('should convert RSA and EC keys', () => {
    const rsa = jwkToKeyObject({ ...rsaKey.export({ format: 'jwk' }), kty: 'RSA' })
    const ec = jwkToKeyObject({ ...ecKey.export({ format: 'jwk' }), kty: 'EC' })

    expect(rsa?.asymmetricKeyType).toBe('rsa')
    expect(ec?.asymmetricKeyType).toBe('ec')
  })

  it('should skip keys that cannot verify signatures', () => {
    expect(jwkToKeyObject({ kty: 'oct' })).toBeUndefined()
    expect(jwkToKeyObject({ kty: 'RSA', n: 'abc' })).toBeUndefined()
  })
})

describe('getJwks', () => {
  beforeEach(() => {
    clearJwksCache()
  })

  it('should keep keys that have a kid and a supported type', async () => {
    const client = vi.fn().mockResolvedValue(jsonResponse(keySet()))

    const keys = await getJwks(JWKS_URL, contextWith(client))

    expect([...keys.keys()]).toEqual(['rsa-1', 'ec-1'])
    expect(client).toHaveBeenCalledWith(JWKS_URL, { method: 'GET' })
  })

  it('should serve cached keys until the TTL passes', async () => {
    const client = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse(keySet()))
      .mockResolvedValueOnce(jsonResponse(keySet()))
    const start = Date.parse('2030-01-01T00:00:00.000Z')

    await getJwks(JWKS_URL, contextWith(client), start)
    await getJwks(JWKS_URL, contextWith(client), start + 59 * 60 * 1000)
    expect(client).toHaveBeenCalledTimes(1)

    await getJwks(JWKS_URL, contextWith(client), start + 60 * 60 * 1000)
    expect(client).toHaveBeenCalledTimes(2)
  })

  it('should report a failed fetch', async () => {
    const client = vi.fn().mockResolvedValue(
      new Response('oops', { status: 500, statusText: 'Internal Server Error' }),
    )

    await expect(getJwks(JWKS_URL, contextWith(client))).rejects.toThrow(
      `Failed to fetch JWKS from ${JWKS_URL}: 500 Internal Server Error`,
    )
  })

  it('should reject a document without keys', async () => {
    const client = vi.fn().mockResolvedValue(jsonResponse({}))

    await expect(getJwks(JWKS_URL, contextWith(client))).rejects.toThrow(
      `Invalid JWKS response from ${JWKS_URL}: missing keys array`,
    )
  })
})

describe('getPublicKeyByKid', () => {
  beforeEach(() => {
    clearJwksCache()
  })

  it('should look up a key by kid', async () => {
    const client = vi.fn().mockResolvedValue(jsonResponse(keySet()))

    const key = await getPublicKeyByKid(JWKS_URL, 'ec-1', contextWith(client))

    expect(key.asymmetricKeyType).toBe('ec')
  })

  it('should throw for an unknown kid', async () => {
    const client = vi.fn().mockResolvedValue(jsonResponse(keySet()))

    await expect(getPublicKeyByKid(JWKS_URL, 'missing', contextWith(client))).rejects.toThrow(
      'public key not found for kid: missing',
    )
  })
})
