import crypto from 'node:crypto'

export type CodeChallengeMethod = 'S256' | 'plain'

/**
 * Generate a cryptographically random code_verifier (RFC 7636).
 * 43 characters, base64url encoded.
 */
export const generateCodeVerifier = (): string => {
  return crypto.randomBytes(32).toString('base64url')
}

/**
 * Derive the code_challenge sent with the authorization request.
 */
export const generateCodeChallenge = (
  codeVerifier: string,
  method: CodeChallengeMethod,
): string => {
  if (method === 'plain') {
    return codeVerifier
  }
  return crypto
    .createHash('sha256')
    .update(codeVerifier, 'utf8')
    .digest('base64url')
}
