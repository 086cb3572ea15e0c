import { generateKeyPairSync } from 'node:crypto'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { jsonResponse } from '../../../tests/helpers/http.ts'
import { callbackParams, providerOptions } from '../../../tests/helpers/provider.ts'
import { OAuth2Session } from '../../oauth2/session.ts'
import { accessTokenHash } from '../../tokens/id-token.ts'
import { clearJwksCache } from '../../tokens/jwks.ts'
import { parseJwt, signJwt } from '../../tokens/jwt.ts'
import {
  APPLE_AUD_OR_ISS,
  APPLE_KEYS_URL,
  AppleProvider,
  makeSecret,
} from '../apple.ts'

const appleKeys = generateKeyPairSync('rsa', { modulusLength: 2048 })

describe('makeSecret', () => {
  it('should mint an ES256 client secret', () => {
    const { privateKey } = generateKeyPairSync('ec', { namedCurve: 'P-256' })
    const pem = privateKey.export({ format: 'pem', type: 'pkcs8' }).toString()

    const secret = makeSecret({
      privateKey: pem,
      teamId: 'TEAM123',
      keyId: 'KEY123',
      clientId: 'com.example.app',
      iat: 1900000000,
      exp: 1900003600,
    })

    const { header, payload } = parseJwt(secret)
    expect(header).toEqual({ alg: 'ES256', typ: 'JWT', kid: 'KEY123' })
    expect(payload).toEqual({
      iss: 'TEAM123',
      iat: 1900000000,
      exp: 1900003600,
      aud: APPLE_AUD_OR_ISS,
      sub: 'com.example.app',
    })
  })

  it('should reject a malformed key', () => {
    expect(() =>
      makeSecret({
        privateKey: 'not a key',
        teamId: 't',
        keyId: 'k',
        clientId: 'c',
        iat: 0,
        exp: 1,
      }),
    ).toThrow('invalid private key')
  })
})

describe('AppleProvider', () => {
  beforeEach(() => {
    clearJwksCache()
  })

  it('should request a form_post callback when name or email is asked for', async () => {
    const withScopes = new AppleProvider({
      ...providerOptions('apple'),
      scopes: ['name', 'email'],
    })
    const withoutScopes = new AppleProvider(providerOptions('apple'))

    const formPost = new URL((await withScopes.beginAuth('s')).getAuthUrl())
    const query = new URL((await withoutScopes.beginAuth('s')).getAuthUrl())

    expect(formPost.searchParams.get('response_mode')).toBe('form_post')
    expect(formPost.searchParams.get('scope')).toBe('name email')
    expect(query.searchParams.has('response_mode')).toBe(false)
  })

  it('should take the user from the verified ID token', async () => {
    const idToken = signJwt(
      {
        iss: APPLE_AUD_OR_ISS,
        aud: 'test-client-id',
        sub: '001234.abcd',
        email: 'relay@privaterelay.appleid.com',
        is_private_email: 'true',
        at_hash: accessTokenHash('access-1'),
        exp: Math.floor(Date.now() / 1000) + 600,
      },
      appleKeys.privateKey,
      'RS256',
      'apple-key',
    )
    const httpClient = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({
          access_token: 'access-1',
          token_type: 'Bearer',
          expires_in: 3600,
          id_token: idToken,
        }),
      )
      .mockResolvedValueOnce(
        jsonResponse({
          keys: [
            { ...appleKeys.publicKey.export({ format: 'jwk' }), kid: 'apple-key' },
          ],
        }),
      )
    const provider = new AppleProvider({ ...providerOptions('apple'), httpClient })
    const session = new OAuth2Session()

    await session.authorize(provider, callbackParams({ code: 'code-1' }))
    const user = await provider.fetchUser(session)

    expect(httpClient.mock.calls[1][0]).toBe(APPLE_KEYS_URL)
    expect(session.extra).toEqual({
      sub: '001234.abcd',
      email: 'relay@privaterelay.appleid.com',
      is_private_email: 'true',
    })
    expect(user.userId).toBe('001234.abcd')
    expect(user.email).toBe('relay@privaterelay.appleid.com')
    expect(user.idToken).toBe(idToken)
    expect(user.rawData).toEqual({
      sub: '001234.abcd',
      email: 'relay@privaterelay.appleid.com',
      isPrivateEmail: true,
    })
  })

  it('should reject an ID token for another audience', async () => {
    const idToken = signJwt(
      { iss: APPLE_AUD_OR_ISS, aud: 'someone-else', sub: 'x' },
      appleKeys.privateKey,
      'RS256',
      'apple-key',
    )
    const httpClient = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-1', id_token: idToken }),
      )
      .mockResolvedValueOnce(
        jsonResponse({
          keys: [
            { ...appleKeys.publicKey.export({ format: 'jwk' }), kid: 'apple-key' },
          ],
        }),
      )
    const provider = new AppleProvider({ ...providerOptions('apple'), httpClient })

    await expect(
      new OAuth2Session().authorize(provider, callbackParams({ code: 'c' })),
    ).rejects.toThrow('audience is incorrect')
  })
})
