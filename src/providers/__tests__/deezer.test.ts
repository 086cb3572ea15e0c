import { describe, expect, it } from 'vitest'
import { mockFetch, requestAt, jsonResponse, textResponse } from '../../../tests/helpers/http.ts'
import {
  authorizedSession,
  callbackParams,
  providerOptions,
} from '../../../tests/helpers/provider.ts'
import { OAuth2Session } from '../../oauth2/session.ts'
import { DeezerProvider } from '../deezer.ts'

describe('DeezerProvider', () => {
  it('should build the legacy authorization URL', async () => {
    const provider = new DeezerProvider({
      ...providerOptions('deezer'),
      scopes: ['basic_access', 'offline_access'],
    })

    const session = await provider.beginAuth('state-1')

    expect(session.getAuthUrl()).toBe(
      'https://connect.deezer.com/oauth/auth.php?app_id=test-client-id&redirect_uri=https%3A%2F%2Fapp.example.com%2Fauth%2Fdeezer%2Fcallback&perms=email%2Cbasic_access%2Coffline_access&state=state-1',
    )
  })

  it('should fetch the token with a GET and read a form body', async () => {
    const fetchMock = mockFetch(
      textResponse('access_token=deezer-token&expires=3600', 200, 'text/html'),
    )
    const provider = new DeezerProvider(providerOptions('deezer'))
    const session = new OAuth2Session()

    await session.authorize(provider, callbackParams({ code: 'code-1' }))

    const request = requestAt(fetchMock, 0)
    expect(request.method).toBe('GET')
    expect(Object.fromEntries(request.url.searchParams)).toEqual({
      app_id: 'test-client-id',
      secret: 'test-secret',
      code: 'code-1',
      output: 'json',
    })
    expect(session.accessToken).toBe('deezer-token')
    expect(session.expiresAt).toBeInstanceOf(Date)
  })

  it('should pass the token in the query when fetching the profile', async () => {
    const fetchMock = mockFetch(
      jsonResponse({
        id: 2529,
        name: 'ada',
        firstname: 'Ada',
        lastname: 'Lovelace',
        email: 'ada@example.com',
        picture: 'https://api.deezer.com/user/2529/image',
        city: 'London',
      }),
    )

    const user = await new DeezerProvider(providerOptions('deezer')).fetchUser(
      authorizedSession('access-1'),
    )

    expect(requestAt(fetchMock, 0).url.searchParams.get('access_token')).toBe('access-1')
    expect(user).toMatchObject({
      userId: '2529',
      nickName: 'ada',
      firstName: 'Ada',
      lastName: 'Lovelace',
      location: 'London',
    })
  })

  it('should not offer refresh tokens', () => {
    expect(new DeezerProvider(providerOptions('deezer')).refreshTokenAvailable()).toBe(false)
  })
})
