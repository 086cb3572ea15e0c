import crypto from 'node:crypto'
import { type RequestContext, sendRequest } from '../plumbing/http.ts'
import type { JWKS, JWK } from './types/jwk.ts'

/** Default cache TTL: 1 hour. Providers rotate keys slowly. */
const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000

interface CachedKeySet {
  keys: Map<string, crypto.KeyObject>
  expiresAt: number
}

const cache = new Map<string, CachedKeySet>()

const DEFAULT_CONTEXT: RequestContext = { provider: 'jwks' }

const fetchJwks = async (
  jwksUrl: string,
  context: RequestContext,
): Promise<JWKS> => {
  const response = await sendRequest(jwksUrl, { method: 'GET' }, context)
  if (!response.ok) {
    throw new Error(
      `Failed to fetch JWKS from ${jwksUrl}: ${response.status} ${response.statusText}`,
    )
  }
  const data = (await response.json()) as JWKS
  if (!data.keys || !Array.isArray(data.keys)) {
    throw new Error(`Invalid JWKS response from ${jwksUrl}: missing keys array`)
  }
  return data
}

/**
 * Convert an RSA or EC JWK to a Node.js KeyObject. Returns undefined for key
 * types that cannot verify RS256/ES256 signatures.
 */
export const jwkToKeyObject = (jwk: JWK): crypto.KeyObject | undefined => {
  if (jwk.kty === 'RSA' && jwk.n && jwk.e) {
    return crypto.createPublicKey({
      key: { kty: 'RSA', n: jwk.n, e: jwk.e },
      format: 'jwk',
    })
  }
  if (jwk.kty === 'EC' && jwk.crv && jwk.x && jwk.y) {
    return crypto.createPublicKey({
      key: { kty: 'EC', crv: jwk.crv, x: jwk.x, y: jwk.y },
      format: 'jwk',
    })
  }
  return undefined
}

/**
 * Fetch and cache the key set published at `jwksUrl`. Returns a map of
 * kid -> KeyObject.
 */
export const getJwks = async (
  jwksUrl: string,
  context: RequestContext = DEFAULT_CONTEXT,
  now: number = Date.now(),
): Promise<Map<string, crypto.KeyObject>> => {
  const cached = cache.get(jwksUrl)
  if (cached && cached.keys.size > 0 && now < cached.expiresAt) {
    return cached.keys
  }

  const jwks = await fetchJwks(jwksUrl, context)
  const keys = new Map<string, crypto.KeyObject>()
  for (const jwk of jwks.keys) {
    if (!jwk.kid) continue
    const keyObject = jwkToKeyObject(jwk)
    if (keyObject) {
      keys.set(jwk.kid, keyObject)
    }
  }

  cache.set(jwksUrl, { keys, expiresAt: now + DEFAULT_CACHE_TTL_MS })
  return keys
}

/**
 * Get a public key by key ID. Fetches the key set if not cached.
 */
export const getPublicKeyByKid = async (
  jwksUrl: string,
  kid: string,
  context: RequestContext = DEFAULT_CONTEXT,
): Promise<crypto.KeyObject> => {
  const keys = await getJwks(jwksUrl, context)
  const key = keys.get(kid)
  if (!key) {
    throw new Error(`public key not found for kid: ${kid}`)
  }
  return key
}

/** Drop every cached key set. */
export const clearJwksCache = (): void => {
  cache.clear()
}
