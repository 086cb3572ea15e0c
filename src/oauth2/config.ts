import { type HttpClient, sendRequest } from '../plumbing/http.ts'
import type { Token } from './token.ts'

/**
 * How client credentials reach the token endpoint: HTTP Basic
 * (`header`) or client_id/client_secret form fields (`params`).
 */
export type AuthStyle = 'header' | 'params'

export interface Endpoint {
  authUrl: string
  tokenUrl: string
  authStyle?: AuthStyle
}

export interface OAuth2ConfigOptions {
  clientId: string
  clientSecret: string
  redirectUrl: string
  endpoint: Endpoint
  scopes?: string[]
  scopeSeparator?: string
  /** Sent with every token request, e.g. a User-Agent. */
  tokenHeaders?: Record<string, string>
}

export interface TokenRequestContext {
  provider: string
  client?: HttpClient
  debug?: boolean
}

const FORM_CONTENT_TYPES = ['application/x-www-form-urlencoded', 'text/plain']

const readNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

const readString = (value: unknown): string =>
  typeof value === 'string' ? value : ''

/**
 * Build a Token from a token endpoint response body.
 */
export const parseTokenResponse = (
  body: Record<string, unknown>,
  now: Date = new Date(),
): Token => {
  if (typeof body.error === 'string' && body.error) {
    const description = readString(body.error_description)
    throw new Error(
      description
        ? `oauth2: ${body.error}: ${description}`
        : `oauth2: ${body.error}`,
    )
  }

  const accessToken = readString(body.access_token)
  if (!accessToken) {
    throw new Error('oauth2: server response missing access_token')
  }

  const expiresIn = readNumber(body.expires_in) ?? readNumber(body.expires)
  return {
    accessToken,
    tokenType: readString(body.token_type),
    refreshToken: readString(body.refresh_token),
    expiry:
      expiresIn !== undefined && expiresIn > 0
        ? new Date(now.getTime() + expiresIn * 1000)
        : undefined,
    raw: body,
  }
}

/**
 * Decode a token endpoint body as a form when the content type says so,
 * otherwise as JSON with a form fallback.
 */
export const parseTokenBody = (
  contentType: string,
  text: string,
): Record<string, unknown> => {
  const isForm = FORM_CONTENT_TYPES.some((type) => contentType.includes(type))
  if (isForm) {
    return Object.fromEntries(new URLSearchParams(text))
  }
  try {
    const parsed: unknown = JSON.parse(text)
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed))
    }
  } catch {
    // some servers send form bodies with a JSON content type
  }
  return Object.fromEntries(new URLSearchParams(text))
}

/**
 * OAuth 2.0 authorization-code client configuration.
 */
export class OAuth2Config {
  readonly clientId: string
  readonly clientSecret: string
  readonly redirectUrl: string
  readonly endpoint: Endpoint
  readonly scopes: string[]
  readonly scopeSeparator: string
  readonly tokenHeaders: Record<string, string>

  constructor(options: OAuth2ConfigOptions) {
    this.clientId = options.clientId
    this.clientSecret = options.clientSecret
    this.redirectUrl = options.redirectUrl
    this.endpoint = options.endpoint
    this.scopes = options.scopes ?? []
    this.scopeSeparator = options.scopeSeparator ?? ' '
    this.tokenHeaders = options.tokenHeaders ?? {}
  }

  authCodeUrl(state: string, params: Record<string, string> = {}): string {
    const query = new URLSearchParams({
      client_id: this.clientId,
      response_type: 'code',
    })
    if (this.redirectUrl) {
      query.set('redirect_uri', this.redirectUrl)
    }
    if (this.scopes.length > 0) {
      query.set('scope', this.scopes.join(this.scopeSeparator))
    }
    if (state) {
      query.set('state', state)
    }
    for (const [key, value] of Object.entries(params)) {
      query.set(key, value)
    }

    const separator = this.endpoint.authUrl.includes('?') ? '&' : '?'
    return `${this.endpoint.authUrl}${separator}${query.toString()}`
  }

  async exchange(
    code: string,
    context: TokenRequestContext,
    params: Record<string, string> = {},
  ): Promise<Token> {
    const form = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
    })
    if (this.redirectUrl) {
      form.set('redirect_uri', this.redirectUrl)
    }
    for (const [key, value] of Object.entries(params)) {
      form.set(key, value)
    }
    return this.retrieveToken(form, context)
  }

  async refresh(
    refreshToken: string,
    context: TokenRequestContext,
  ): Promise<Token> {
    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    })
    const token = await this.retrieveToken(form, context)
    return token.refreshToken ? token : { ...token, refreshToken }
  }

  private async retrieveToken(
    form: URLSearchParams,
    context: TokenRequestContext,
  ): Promise<Token> {
    const headers: Record<string, string> = {
      ...this.tokenHeaders,
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    }

    if (this.endpoint.authStyle === 'header') {
      const credentials = Buffer.from(
        `${encodeURIComponent(this.clientId)}:${encodeURIComponent(this.clientSecret)}`,
        'utf8',
      ).toString('base64')
      headers.Authorization = `Basic ${credentials}`
    } else {
      form.set('client_id', this.clientId)
      if (this.clientSecret) {
        form.set('client_secret', this.clientSecret)
      }
    }

    const response = await sendRequest(
      this.endpoint.tokenUrl,
      { method: 'POST', headers, body: form.toString() },
      context,
    )
    const text = await response.text()
    if (!response.ok) {
      throw new Error(
        `oauth2: cannot fetch token: ${response.status}\nResponse: ${text}`,
      )
    }

    const contentType = response.headers.get('content-type') ?? ''
    return parseTokenResponse(parseTokenBody(contentType, text))
  }
}
