/**
 * JSON Web Key (JWK) as published in a provider's key set (RFC 7517).
 * Only the public parameters needed to verify signatures are modeled.
 */
export interface JWK {
  /** Key type - 'RSA' or 'EC' for signing keys */
  kty: string
  /** Key ID, matched against the `kid` header of a JWT */
  kid?: string
  use?: string
  alg?: string
  /** RSA modulus, Base64URL-encoded */
  n?: string
  /** RSA public exponent, Base64URL-encoded */
  e?: string
  /** EC curve name, e.g. 'P-256' */
  crv?: string
  /** EC coordinates, Base64URL-encoded */
  x?: string
  y?: string
}

export interface JWKS {
  keys: JWK[]
}
