import { describe, expect, it } from 'vitest'
import { jsonResponse, mockFetch, requestAt } from '../../../tests/helpers/http.ts'
import { authorizedSession, providerOptions } from '../../../tests/helpers/provider.ts'
import { YandexProvider, yandexAvatarUrl } from '../yandex.ts'

describe('yandexAvatarUrl', () => {
  it('should build the avatar URL unless the avatar is empty', () => {
    expect(yandexAvatarUrl({ default_avatar_id: '131652443' })).toBe(
      'https://avatars.yandex.net/get-yapic/131652443/islands-200',
    )
    expect(
      yandexAvatarUrl({ default_avatar_id: '131652443', is_avatar_empty: true }),
    ).toBe('')
  })
})

describe('YandexProvider', () => {
  it('should authenticate with the OAuth scheme', async () => {
    const fetchMock = mockFetch(
      jsonResponse({
        id: '1000034426',
        login: 'ivan',
        display_name: 'Ivan',
        real_name: 'Ivan Ivanov',
        first_name: 'Ivan',
        last_name: 'Ivanov',
        default_email: 'ivan@example.com',
        default_avatar_id: '131652443',
        is_avatar_empty: false,
      }),
    )

    const user = await new YandexProvider(providerOptions('yandex')).fetchUser(
      authorizedSession('access-1'),
    )

    const request = requestAt(fetchMock, 0)
    expect(request.headers.get('Authorization')).toBe('OAuth access-1')
    expect(request.url.searchParams.get('format')).toBe('json')
    expect(user).toMatchObject({
      userId: '1000034426',
      nickName: 'ivan',
      name: 'Ivan Ivanov',
      email: 'ivan@example.com',
      avatarUrl: 'https://avatars.yandex.net/get-yapic/131652443/islands-200',
    })
  })
})
