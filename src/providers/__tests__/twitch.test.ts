import { describe, expect, it } from 'vitest'
import { jsonResponse, mockFetch, requestAt } from '../../../tests/helpers/http.ts'
import { authorizedSession, providerOptions } from '../../../tests/helpers/provider.ts'
import { TwitchProvider } from '../twitch.ts'

describe('TwitchProvider', () => {
  it('should send the client id and map the first user', async () => {
    const fetchMock = mockFetch(
      jsonResponse({
        data: [
          {
            id: '141981764',
            login: 'twitchdev',
            display_name: 'TwitchDev',
            description: 'Supporting third-party developers',
            profile_image_url: 'https://static-cdn.jtvnw.example/profile.png',
            email: 'dev@example.com',
          },
        ],
      }),
    )

    const user = await new TwitchProvider(providerOptions('twitch')).fetchUser(
      authorizedSession(),
    )

    expect(requestAt(fetchMock, 0).headers.get('Client-Id')).toBe('test-client-id')
    expect(user).toMatchObject({
      userId: '141981764',
      name: 'twitchdev',
      nickName: 'TwitchDev',
      email: 'dev@example.com',
      description: 'Supporting third-party developers',
      avatarUrl: 'https://static-cdn.jtvnw.example/profile.png',
    })
  })

  it('should fail when no user is returned', async () => {
    mockFetch(jsonResponse({ data: [] }))

    await expect(
      new TwitchProvider(providerOptions('twitch')).fetchUser(authorizedSession()),
    ).rejects.toThrow('twitch user not found')
  })
})
