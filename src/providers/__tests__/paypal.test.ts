import { afterEach, describe, expect, it, vi } from 'vitest'
import { jsonResponse, mockFetch, requestAt } from '../../../tests/helpers/http.ts'
import { authorizedSession, providerOptions } from '../../../tests/helpers/provider.ts'
import { getPayPalEnvironment, PayPalProvider } from '../paypal.ts'

describe('PayPalProvider', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('should read the environment from PAYPAL_ENV', () => {
    vi.stubEnv('PAYPAL_ENV', 'sandbox')
    expect(getPayPalEnvironment()).toBe('sandbox')

    vi.stubEnv('PAYPAL_ENV', 'live')
    expect(getPayPalEnvironment()).toBe('production')
  })

  it('should use sandbox endpoints in the sandbox', async () => {
    const provider = new PayPalProvider({
      ...providerOptions('paypal'),
      environment: 'sandbox',
    })

    const url = new URL((await provider.beginAuth('state-1')).getAuthUrl())

    expect(`${url.origin}${url.pathname}`).toBe(
      'https://www.sandbox.paypal.com/signin/authorize',
    )
  })

  it('should fall back to the primary address in emails', async () => {
    const fetchMock = mockFetch(
      jsonResponse({
        user_id: 'https://www.paypal.com/webapps/auth/identity/user/mWq6_1sU85v5EG9yHdPxJRrhGHrnMJ-1PQKtX6pcsmA',
        name: 'Ada Lovelace',
        given_name: 'Ada',
        family_name: 'Lovelace',
        emails: [
          { value: 'other@example.com', primary: false },
          { value: 'ada@example.com', primary: true },
        ],
        address: { locality: 'San Jose' },
      }),
    )
    const provider = new PayPalProvider({
      ...providerOptions('paypal'),
      environment: 'production',
    })

    const user = await provider.fetchUser(authorizedSession())

    const request = requestAt(fetchMock, 0)
    expect(`${request.url.origin}${request.url.pathname}`).toBe(
      'https://api-m.paypal.com/v1/identity/oauth2/userinfo',
    )
    expect(request.url.searchParams.get('schema')).toBe('openid')
    expect(user).toMatchObject({
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      location: 'San Jose',
    })
  })
})
