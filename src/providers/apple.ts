import crypto from 'node:crypto'
import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import { getTokenExtra, type Token } from '../oauth2/token.ts'
import { verifyIdToken } from '../tokens/id-token.ts'
import { signJwt } from '../tokens/jwt.ts'
import type { Params } from './types/provider.ts'
import type { UserFields } from './types/user.ts'

export const APPLE_AUTH_URL = 'https://appleid.apple.com/auth/authorize'
export const APPLE_TOKEN_URL = 'https://appleid.apple.com/auth/token'
export const APPLE_KEYS_URL = 'https://appleid.apple.com/auth/keys'
/** Both the client secret audience and the ID token issuer. */
export const APPLE_AUD_OR_ISS = 'https://appleid.apple.com'

export const AppleScope = {
  email: 'email',
  name: 'name',
} as const

export interface AppleSecretParams {
  /** PKCS#8 PEM of the key downloaded from the developer portal. */
  privateKey: string
  teamId: string
  keyId: string
  clientId: string
  /** Issued-at and expiry, seconds since the epoch. */
  iat: number
  exp: number
}

/**
 * Mint the ES256-signed client secret Apple expects in place of a static
 * secret.
 */
export const makeSecret = (params: AppleSecretParams): string => {
  let key: crypto.KeyObject
  try {
    key = crypto.createPrivateKey(params.privateKey.trim())
  } catch {
    throw new Error('invalid private key')
  }
  return signJwt(
    {
      iss: params.teamId,
      iat: params.iat,
      exp: params.exp,
      aud: APPLE_AUD_OR_ISS,
      sub: params.clientId,
    },
    key,
    'ES256',
    params.keyId,
  )
}

/** Apple sends booleans in ID tokens either as JSON booleans or strings. */
const boolClaim = (value: unknown): boolean =>
  value === true || value === 'true'

/**
 * Sign in with Apple. There is no profile endpoint: the user id and email
 * come from the verified ID token.
 */
export class AppleProvider extends OAuth2Provider {
  tokenExtraKeys = ['sub', 'email', 'is_private_email'] as const
  readonly formPostResponseMode: boolean

  constructor(options: OAuth2ProviderOptions) {
    super(
      {
        name: 'apple',
        endpoint: { authUrl: APPLE_AUTH_URL, tokenUrl: APPLE_TOKEN_URL },
      },
      options,
    )
    // Apple only returns name and email to a form_post callback
    this.formPostResponseMode = this.scopes.some(
      (scope) => scope === AppleScope.name || scope === AppleScope.email,
    )
  }

  protected authCodeParams(): Record<string, string> {
    return this.formPostResponseMode ? { response_mode: 'form_post' } : {}
  }

  async exchangeCode(session: OAuth2Session, params: Params): Promise<Token> {
    const token = await super.exchangeCode(session, params)
    const idToken = getTokenExtra(token, 'id_token')
    if (!idToken) {
      return token
    }

    const claims = await verifyIdToken(idToken, {
      jwksUrl: APPLE_KEYS_URL,
      issuers: [APPLE_AUD_OR_ISS],
      audience: this.clientKey,
      accessToken: token.accessToken,
      context: this.requestContext('fetch the signing keys'),
    })
    return {
      ...token,
      raw: {
        ...token.raw,
        sub: typeof claims.sub === 'string' ? claims.sub : '',
        email: typeof claims.email === 'string' ? claims.email : '',
        is_private_email: String(boolClaim(claims.is_private_email)),
      },
    }
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    return {
      rawData: {
        sub: session.extra.sub ?? '',
        email: session.extra.email ?? '',
        isPrivateEmail: session.extra.is_private_email === 'true',
      },
      userId: session.extra.sub,
      email: session.extra.email,
    }
  }
}
