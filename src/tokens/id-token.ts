import crypto from 'node:crypto'
import type { RequestContext } from '../plumbing/http.ts'
import { getPublicKeyByKid } from './jwks.ts'
import { base64UrlEncode, parseJwt, verifyJwt } from './jwt.ts'

export interface IdTokenExpectations {
  jwksUrl: string
  /** Accepted `iss` values. */
  issuers: readonly string[]
  /** Client id that must appear in `aud`. */
  audience: string
  /** When given, the `at_hash` claim must be present and match it. */
  accessToken?: string
  nonce?: string
  /** Provider, client and debug flag for the key set request. */
  context?: RequestContext
  now?: Date
}

/**
 * at_hash: base64url of the left half of the SHA-256 digest of the access
 * token.
 */
export const accessTokenHash = (accessToken: string): string => {
  const digest = crypto.createHash('sha256').update(accessToken).digest()
  return base64UrlEncode(digest.subarray(0, digest.length / 2))
}

const audienceMatches = (aud: unknown, expected: string): boolean =>
  aud === expected || (Array.isArray(aud) && aud.includes(expected))

/**
 * Validate an OpenID Connect ID token: signature against the issuer's
 * JWKS, then iss, aud, exp, nbf and the optional at_hash and nonce.
 */
export const verifyIdToken = async (
  idToken: string,
  expected: IdTokenExpectations,
): Promise<Record<string, unknown>> => {
  const { header } = parseJwt(idToken)
  const kid = header.kid
  if (typeof kid !== 'string' || !kid) {
    throw new Error('ID token missing kid in header')
  }

  const publicKey = await getPublicKeyByKid(
    expected.jwksUrl,
    kid,
    expected.context,
  )
  const { payload } = verifyJwt(idToken, publicKey, undefined, expected.now)

  if (typeof payload.iss !== 'string' || !expected.issuers.includes(payload.iss)) {
    throw new Error('issuer is incorrect')
  }
  if (!audienceMatches(payload.aud, expected.audience)) {
    throw new Error('audience is incorrect')
  }
  if (
    expected.accessToken !== undefined &&
    payload.at_hash !== accessTokenHash(expected.accessToken)
  ) {
    throw new Error('identity token invalid')
  }
  if (expected.nonce !== undefined && payload.nonce !== expected.nonce) {
    throw new Error('nonce is incorrect')
  }
  return payload
}
