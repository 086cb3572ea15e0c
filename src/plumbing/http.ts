import { log } from './logger.ts'

/** A fetch-compatible function. Providers fall back to the global fetch. */
export type HttpClient = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>

export interface RequestContext {
  provider: string
  client?: HttpClient
  debug?: boolean
  /** Wording for the status error, e.g. "fetch user information". */
  purpose?: string
}

export const resolveHttpClient = (client?: HttpClient): HttpClient =>
  client ?? fetch

/**
 * Perform a request for a provider. Logs method, url and status when
 * debugging; query strings are dropped from the log since they may carry
 * tokens.
 */
export const sendRequest = async (
  url: string | URL,
  init: RequestInit,
  context: RequestContext,
): Promise<Response> => {
  const response = await resolveHttpClient(context.client)(url, init)
  if (context.debug) {
    const target = new URL(url)
    log({
      message: 'Provider request',
      provider: context.provider,
      method: init.method ?? 'GET',
      url: `${target.origin}${target.pathname}`,
      status: response.status,
    })
  }
  return response
}

/**
 * Request a JSON document, throwing on a non-2xx status.
 */
export const requestJson = async <T>(
  url: string | URL,
  init: RequestInit,
  context: RequestContext,
): Promise<T> => {
  const response = await sendRequest(url, init, context)
  if (!response.ok) {
    throw new Error(
      `${context.provider} responded with a ${response.status} trying to ${context.purpose ?? 'fetch user information'}`,
    )
  }
  return (await response.json()) as T
}

export const getJson = async <T>(
  url: string | URL,
  context: RequestContext & { headers?: Record<string, string> },
): Promise<T> =>
  requestJson<T>(url, { method: 'GET', headers: context.headers }, context)

export const bearer = (accessToken: string): Record<string, string> => ({
  Authorization: `Bearer ${accessToken}`,
})
