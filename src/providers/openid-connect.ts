import type { AuthStyle } from '../oauth2/config.ts'
import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { getTokenExtra, type Token } from '../oauth2/token.ts'
import {
  type DiscoveryDocument,
  fetchDiscoveryDocument,
} from '../oidc/discovery.ts'
import { bearer, getJson } from '../plumbing/http.ts'
import { verifyIdToken } from '../tokens/id-token.ts'
import { parseJwt } from '../tokens/jwt.ts'
import type { Params } from './types/provider.ts'
import type { UserFields } from './types/user.ts'

export const OpenIDClaim = {
  subject: 'sub',
  preferredUsername: 'preferred_username',
  email: 'email',
  name: 'name',
  nickname: 'nickname',
  picture: 'picture',
  givenName: 'given_name',
  familyName: 'family_name',
  locale: 'locale',
} as const

/** Allowance for clock drift when checking ID token expiry. */
const CLOCK_SKEW_MS = 10 * 1000

export interface OpenIDConnectProviderOptions extends OAuth2ProviderOptions {
  discovery: DiscoveryDocument
}

/**
 * Claim names read for each user field, first non-empty string wins.
 */
export interface ClaimNames {
  userId: string[]
  email: string[]
  name: string[]
  nickName: string[]
  firstName: string[]
  lastName: string[]
  avatarUrl: string[]
  location: string[]
}

const DEFAULT_CLAIM_NAMES: ClaimNames = {
  userId: [OpenIDClaim.subject],
  email: [OpenIDClaim.email],
  name: [OpenIDClaim.name],
  nickName: [OpenIDClaim.nickname, OpenIDClaim.preferredUsername],
  firstName: [OpenIDClaim.givenName],
  lastName: [OpenIDClaim.familyName],
  avatarUrl: [OpenIDClaim.picture],
  location: [OpenIDClaim.locale],
}

export const getClaimValue = (
  claims: Record<string, unknown>,
  names: readonly string[],
): string => {
  for (const name of names) {
    const value = claims[name]
    if (typeof value === 'string' && value.length > 0) {
      return value
    }
  }
  return ''
}

const authStyleFor = (document: DiscoveryDocument): AuthStyle | undefined => {
  const methods = document.token_endpoint_auth_methods_supported
  if (methods && !methods.includes('client_secret_post') && methods.includes('client_secret_basic')) {
    return 'header'
  }
  return undefined
}

/**
 * Generic OpenID Connect provider configured from a discovery document.
 * Identity comes from the ID token, merged with the userinfo response when
 * the issuer publishes a userinfo endpoint.
 */
export class OpenIDConnectProvider extends OAuth2Provider {
  readonly discovery: DiscoveryDocument
  claimNames: ClaimNames = { ...DEFAULT_CLAIM_NAMES }
  /** Skip the userinfo call and use ID token claims only. */
  skipUserInfo = false

  constructor(options: OpenIDConnectProviderOptions) {
    super(
      {
        name: 'openid-connect',
        endpoint: {
          authUrl: options.discovery.authorization_endpoint,
          tokenUrl: options.discovery.token_endpoint,
          authStyle: authStyleFor(options.discovery),
        },
        requiredScopes: ['openid'],
      },
      options,
    )
    this.discovery = options.discovery
  }

  /** Fetch the discovery document and build the provider from it. */
  static async discover(
    options: OAuth2ProviderOptions & { discoveryUrl: string; debug?: boolean },
  ): Promise<OpenIDConnectProvider> {
    const discovery = await fetchDiscoveryDocument(options.discoveryUrl, {
      provider: 'openid-connect',
      client: options.httpClient,
      debug: options.debug,
    })
    const provider = new OpenIDConnectProvider({ ...options, discovery })
    provider.debug(options.debug ?? false)
    return provider
  }

  async exchangeCode(session: OAuth2Session, params: Params): Promise<Token> {
    const token = await super.exchangeCode(session, params)
    const idToken = getTokenExtra(token, 'id_token')
    if (!idToken) {
      throw new Error(`${this.providerName} did not return an id_token`)
    }
    if (this.discovery.jwks_uri) {
      await verifyIdToken(idToken, {
        jwksUrl: this.discovery.jwks_uri,
        issuers: [this.discovery.issuer],
        audience: this.clientKey,
        context: this.requestContext('fetch the signing keys'),
      })
    }
    return token
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const { payload: idClaims } = parseJwt(session.idToken)

    let expiresAt = session.expiresAt
    if (typeof idClaims.exp === 'number') {
      const idExpiry = new Date(idClaims.exp * 1000)
      if (idExpiry.getTime() + CLOCK_SKEW_MS < Date.now()) {
        throw new Error('user info JWT token is expired')
      }
      if (!expiresAt || idExpiry < expiresAt) {
        expiresAt = idExpiry
      }
    }

    const claims = { ...idClaims }
    const userInfoUrl = this.discovery.userinfo_endpoint
    if (userInfoUrl && !this.skipUserInfo) {
      const userInfo = await getJson<Record<string, unknown>>(userInfoUrl, {
        ...this.requestContext(),
        headers: bearer(session.accessToken),
      })
      if (userInfo.sub !== idClaims.sub) {
        throw new Error(
          `userinfo 'sub' claim (${String(userInfo.sub)}) did not match id_token 'sub' claim (${String(idClaims.sub)})`,
        )
      }
      Object.assign(claims, userInfo)
    }

    const names = this.claimNames
    return {
      rawData: claims,
      expiresAt,
      userId: getClaimValue(claims, names.userId),
      email: getClaimValue(claims, names.email),
      name: getClaimValue(claims, names.name),
      nickName: getClaimValue(claims, names.nickName),
      firstName: getClaimValue(claims, names.firstName),
      lastName: getClaimValue(claims, names.lastName),
      avatarUrl: getClaimValue(claims, names.avatarUrl),
      location: getClaimValue(claims, names.location),
    }
  }
}
