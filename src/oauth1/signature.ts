import crypto from 'node:crypto'

export type SignatureMethod = 'HMAC-SHA1' | 'RSA-SHA1' | 'PLAINTEXT'

/**
 * RFC 5849 percent-encoding: everything but unreserved characters.
 */
export const percentEncode = (value: string): string =>
  encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  )

/**
 * Normalized request parameters: encoded, sorted by name then value,
 * joined with '&'.
 */
export const normalizeParameters = (params: Array<[string, string]>): string =>
  params
    .map(([key, value]) => [percentEncode(key), percentEncode(value)] as const)
    .sort(([keyA, valueA], [keyB, valueB]) => {
      if (keyA !== keyB) return keyA < keyB ? -1 : 1
      if (valueA === valueB) return 0
      return valueA < valueB ? -1 : 1
    })
    .map(([key, value]) => `${key}=${value}`)
    .join('&')

/**
 * Base string URI: scheme and host lowercased, default ports and the query
 * dropped.
 */
export const baseStringUri = (url: string): string => {
  const parsed = new URL(url)
  return `${parsed.protocol}//${parsed.host.toLowerCase()}${parsed.pathname}`
}

export const signatureBaseString = (
  method: string,
  url: string,
  params: Array<[string, string]>,
): string =>
  [
    method.toUpperCase(),
    percentEncode(baseStringUri(url)),
    percentEncode(normalizeParameters(params)),
  ].join('&')

export interface SigningKeys {
  consumerSecret: string
  tokenSecret: string
  privateKey?: crypto.KeyObject | string
}

export const sign = (
  signatureMethod: SignatureMethod,
  baseString: string,
  keys: SigningKeys,
): string => {
  const key = `${percentEncode(keys.consumerSecret)}&${percentEncode(keys.tokenSecret)}`

  switch (signatureMethod) {
    case 'PLAINTEXT':
      return key
    case 'HMAC-SHA1':
      return crypto.createHmac('sha1', key).update(baseString).digest('base64')
    case 'RSA-SHA1': {
      if (!keys.privateKey) {
        throw new Error('RSA-SHA1 signing requires a private key')
      }
      const signer = crypto.createSign('RSA-SHA1')
      signer.update(baseString)
      signer.end()
      return signer.sign(keys.privateKey, 'base64')
    }
  }
}
