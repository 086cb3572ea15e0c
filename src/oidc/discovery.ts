import { getJson, type RequestContext } from '../plumbing/http.ts'

/** The parts of an OpenID Provider metadata document the client uses. */
export interface DiscoveryDocument {
  issuer: string
  authorization_endpoint: string
  token_endpoint: string
  userinfo_endpoint?: string
  jwks_uri?: string
  scopes_supported?: string[]
  token_endpoint_auth_methods_supported?: string[]
}

/**
 * Fetch `/.well-known/openid-configuration` (or any metadata URL) and
 * check the endpoints the authorization-code flow needs.
 */
export const fetchDiscoveryDocument = async (
  discoveryUrl: string,
  context: RequestContext = { provider: 'openid-connect' },
): Promise<DiscoveryDocument> => {
  const document = await getJson<Partial<DiscoveryDocument>>(discoveryUrl, {
    ...context,
    purpose: 'fetch the discovery document',
  })
  if (
    !document.issuer ||
    !document.authorization_endpoint ||
    !document.token_endpoint
  ) {
    throw new Error(
      `discovery document at ${discoveryUrl} is missing issuer, authorization_endpoint or token_endpoint`,
    )
  }
  return {
    ...document,
    issuer: document.issuer,
    authorization_endpoint: document.authorization_endpoint,
    token_endpoint: document.token_endpoint,
  }
}
