import { generateKeyPairSync, verify } from 'node:crypto'
import { describe, expect, it } from 'vitest'
import {
  baseStringUri,
  normalizeParameters,
  percentEncode,
  sign,
  signatureBaseString,
} from '../signature.ts'

describe('OAuth1 signatures', () => {
  it('should percent-encode reserved characters', () => {
    expect(percentEncode("Ladies + Gentlemen!*'()")).toBe(
      'Ladies%20%2B%20Gentlemen%21%2A%27%28%29',
    )
    expect(percentEncode('a-b.c_d~e')).toBe('a-b.c_d~e')
  })

  it('should sort parameters by name then value', () => {
    expect(
      normalizeParameters([
        ['b', '2'],
        ['a', '3'],
        ['a', '1'],
      ]),
    ).toBe('a=1&a=3&b=2')
  })

  it('should drop the query and default port from the base string URI', () => {
    expect(baseStringUri('HTTP://Example.COM:80/r%20v/X?id=123')).toBe(
      'http://example.com/r%20v/X',
    )
  })

  it('should build the base string and HMAC-SHA1 signature', () => {
    const baseString = signatureBaseString(
      'get',
      'http://photos.example.net/photos?file=vacation.jpg&size=original',
      [
        ['oauth_consumer_key', 'dpf43f3p2l4k3l03'],
        ['oauth_nonce', 'kllo9940pd9333jh'],
        ['oauth_signature_method', 'HMAC-SHA1'],
        ['oauth_timestamp', '1191242096'],
        ['oauth_version', '1.0'],
        ['oauth_token', 'nnch734d00sl2jdk'],
        ['file', 'vacation.jpg'],
        ['size', 'original'],
      ],
    )

    expect(baseString).toBe(
      'GET&http%3A%2F%2Fphotos.example.net%2Fphotos&file%3Dvacation.jpg%26oauth_consumer_key%3Ddpf43f3p2l4k3l03%26oauth_nonce%3Dkllo9940pd9333jh%26oauth_signature_method%3DHMAC-SHA1%26oauth_timestamp%3D1191242096%26oauth_token%3Dnnch734d00sl2jdk%26oauth_version%3D1.0%26size%3Doriginal',
    )
    expect(
      sign('HMAC-SHA1', baseString, {
        consumerSecret: 'kd94hf93k423kf44',
        tokenSecret: 'pfkkdhi9sl3r4s00',
      }),
    ).toBe('tR3+Ty81lMeYAr/Fid0kMTYa/WM=')
  })

  it('should use the encoded key for PLAINTEXT', () => {
    expect(
      sign('PLAINTEXT', 'ignored', {
        consumerSecret: 'test-secret',
        tokenSecret: 'token&secret',
      }),
    ).toBe('test-secret&token%26secret')
  })

  it('should sign RSA-SHA1 with the private key', () => {
    const { privateKey, publicKey } = generateKeyPairSync('rsa', {
      modulusLength: 2048,
    })

    const signature = sign('RSA-SHA1', 'base-string', {
      consumerSecret: '',
      tokenSecret: '',
      privateKey,
    })

    expect(
      verify('sha1', Buffer.from('base-string'), publicKey, Buffer.from(signature, 'base64')),
    ).toBe(true)
  })

  it('should require a private key for RSA-SHA1', () => {
    expect(() =>
      sign('RSA-SHA1', 'base-string', { consumerSecret: '', tokenSecret: '' }),
    ).toThrow('RSA-SHA1 signing requires a private key')
  })
})
