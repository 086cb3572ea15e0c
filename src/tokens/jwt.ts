import crypto from 'node:crypto'

export type JwtAlgorithm = 'RS256' | 'ES256'

export interface JwtHeader {
  alg: JwtAlgorithm
  typ: 'JWT'
  kid?: string
}

export interface DecodedJwt {
  header: Record<string, unknown>
  payload: Record<string, unknown>
}

/**
 * Encodes a Buffer to Base64URL format
 * Base64URL is Base64 with URL-safe characters and no padding
 */
export const base64UrlEncode = (buffer: Buffer): string => {
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '')
}

/**
 * Decodes a Base64URL string to a Buffer
 */
export const base64UrlDecode = (str: string): Buffer => {
  let base64 = str.replace(/-/g, '+').replace(/_/g, '/')
  while (base64.length % 4) {
    base64 += '='
  }
  return Buffer.from(base64, 'base64')
}

export const createJwtHeader = (
  algorithm: JwtAlgorithm,
  kid?: string,
): JwtHeader => {
  const header: JwtHeader = {
    alg: algorithm,
    typ: 'JWT',
  }
  if (kid) {
    header.kid = kid
  }
  return header
}

const toKeyObject = (
  key: string | Buffer | crypto.KeyObject,
  kind: 'private' | 'public',
): crypto.KeyObject => {
  if (typeof key !== 'string' && !Buffer.isBuffer(key)) {
    return key
  }
  return kind === 'private'
    ? crypto.createPrivateKey(key)
    : crypto.createPublicKey(key)
}

/**
 * Signs a JWT using RS256 (RSA with SHA-256) or ES256 (ECDSA P-256 with SHA-256)
 */
export const signJwt = (
  payload: Record<string, unknown>,
  privateKey: string | Buffer | crypto.KeyObject,
  algorithm: JwtAlgorithm = 'RS256',
  kid?: string,
): string => {
  const header = createJwtHeader(algorithm, kid)

  const encodedHeader = base64UrlEncode(Buffer.from(JSON.stringify(header)))
  const encodedPayload = base64UrlEncode(Buffer.from(JSON.stringify(payload)))

  const signatureInput = `${encodedHeader}.${encodedPayload}`

  // Node.js crypto uses 'RSA-SHA256' for RS256 and 'SHA256' for ES256 (ECDSA)
  const signAlgorithm = algorithm === 'RS256' ? 'RSA-SHA256' : 'SHA256'
  const sign = crypto.createSign(signAlgorithm)
  sign.update(signatureInput)
  sign.end()

  const keyObject = toKeyObject(privateKey, 'private')

  // ES256 signatures are IEEE P1363 (r || s), not DER
  const signOptions =
    algorithm === 'ES256'
      ? { key: keyObject, dsaEncoding: 'ieee-p1363' as const }
      : keyObject
  const signature = sign.sign(signOptions)

  return `${signatureInput}.${base64UrlEncode(signature)}`
}

const decodeSegment = (segment: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(base64UrlDecode(segment).toString('utf-8'))
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('segment is not a JSON object')
  }
  return Object.fromEntries(Object.entries(parsed))
}

/**
 * Parses a JWT into its component parts without verifying it
 */
export const parseJwt = (
  token: string,
): DecodedJwt & { signature: string } => {
  const parts = token.split('.')
  if (parts.length !== 3) {
    throw new Error('Invalid JWT format: token must have three parts')
  }

  const [encodedHeader, encodedPayload, encodedSignature] = parts

  try {
    return {
      header: decodeSegment(encodedHeader),
      payload: decodeSegment(encodedPayload),
      signature: encodedSignature,
    }
  } catch (error) {
    throw new Error(
      `Invalid JWT format: failed to parse token parts - ${error instanceof Error ? error.message : String(error)}`,
    )
  }
}

const isJwtAlgorithm = (value: unknown): value is JwtAlgorithm =>
  value === 'RS256' || value === 'ES256'

const readNumericClaim = (
  payload: Record<string, unknown>,
  claim: string,
): number | undefined => {
  const value = payload[claim]
  return typeof value === 'number' ? value : undefined
}

/**
 * Verifies a JWT signature and the exp/nbf claims
 */
export const verifyJwt = (
  token: string,
  publicKey: string | Buffer | crypto.KeyObject,
  algorithm?: JwtAlgorithm,
  now: Date = new Date(),
): DecodedJwt => {
  const { header, payload, signature } = parseJwt(token)

  const headerAlgorithm = header.alg
  if (!isJwtAlgorithm(headerAlgorithm)) {
    throw new Error(
      `Unsupported JWT algorithm: ${String(headerAlgorithm)}. Only RS256 and ES256 are supported.`,
    )
  }
  if (algorithm && headerAlgorithm !== algorithm) {
    throw new Error(
      `JWT algorithm mismatch: token uses ${headerAlgorithm} but verification requested ${algorithm}`,
    )
  }

  const signatureInput = token.split('.').slice(0, 2).join('.')
  const verifyAlgorithm = headerAlgorithm === 'RS256' ? 'RSA-SHA256' : 'SHA256'
  const verify = crypto.createVerify(verifyAlgorithm)
  verify.update(signatureInput)
  verify.end()

  const keyObject = toKeyObject(publicKey, 'public')

  let isValid = false
  try {
    const verifyOptions =
      headerAlgorithm === 'ES256'
        ? { key: keyObject, dsaEncoding: 'ieee-p1363' as const }
        : keyObject
    isValid = verify.verify(verifyOptions, base64UrlDecode(signature))
  } catch (error) {
    // wrong key type or malformed signature
    throw new Error(
      `Invalid JWT signature: ${error instanceof Error ? error.message : String(error)}`,
    )
  }
  if (!isValid) {
    throw new Error('Invalid JWT signature')
  }

  const nowSeconds = Math.floor(now.getTime() / 1000)

  const exp = readNumericClaim(payload, 'exp')
  if (exp !== undefined && nowSeconds >= exp) {
    throw new Error('JWT has expired')
  }

  const nbf = readNumericClaim(payload, 'nbf')
  if (nbf !== undefined && nowSeconds < nbf) {
    throw new Error('JWT is not yet valid (nbf claim)')
  }

  return { header, payload }
}
