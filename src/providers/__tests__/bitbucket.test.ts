import { describe, expect, it } from 'vitest'
import { jsonResponse, mockFetch, requestAt } from '../../../tests/helpers/http.ts'
import { authorizedSession, providerOptions } from '../../../tests/helpers/provider.ts'
import { BITBUCKET_EMAILS_URL, BitbucketProvider } from '../bitbucket.ts'

const profile = {
  uuid: '{c0ffee}',
  username: 'ada',
  display_name: 'Ada Lovelace',
  location: null,
  links: { avatar: { href: 'https://bitbucket.example/ada.png' } },
}

describe('BitbucketProvider', () => {
  it('should combine the profile with the primary confirmed email', async () => {
    const fetchMock = mockFetch(
      jsonResponse(profile),
      jsonResponse({
        values: [
          { email: 'unconfirmed@example.com', is_primary: true, is_confirmed: false },
          { email: 'ada@example.com', is_primary: true, is_confirmed: true },
        ],
      }),
    )

    const user = await new BitbucketProvider(providerOptions('bitbucket')).fetchUser(
      authorizedSession(),
    )

    expect(user).toMatchObject({
      userId: '{c0ffee}',
      nickName: 'ada',
      name: 'Ada Lovelace',
      avatarUrl: 'https://bitbucket.example/ada.png',
      location: '',
      email: 'ada@example.com',
    })
    expect(requestAt(fetchMock, 1).url.toString()).toBe(BITBUCKET_EMAILS_URL)
  })

  it('should fail without a primary confirmed email', async () => {
    mockFetch(jsonResponse(profile), jsonResponse({ values: [] }))

    await expect(
      new BitbucketProvider(providerOptions('bitbucket')).fetchUser(
        authorizedSession(),
      ),
    ).rejects.toThrow(
      'bitbucket did not return any confirmed, primary email address',
    )
  })
})
