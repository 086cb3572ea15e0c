import { describe, expect, it } from 'vitest'
import { jsonResponse, mockFetch, requestAt } from '../../../tests/helpers/http.ts'
import { authorizedSession, providerOptions } from '../../../tests/helpers/provider.ts'
import { AmazonProvider } from '../amazon.ts'
import { Auth0Provider } from '../auth0.ts'
import { AzureADV2Provider } from '../azureadv2.ts'
import { BoxProvider } from '../box.ts'
import { DigitalOceanProvider } from '../digitalocean.ts'
import { FitbitProvider } from '../fitbit.ts'
import { GiteaProvider } from '../gitea.ts'
import { GitLabProvider } from '../gitlab.ts'
import { HerokuProvider } from '../heroku.ts'
import { LinkedInProvider } from '../linkedin.ts'
import { MastodonProvider } from '../mastodon.ts'
import { MICROSOFT_GRAPH_PHOTO_URL, MicrosoftOnlineProvider } from '../microsoftonline.ts'
import { OktaProvider } from '../okta.ts'
import { PatreonProvider } from '../patreon.ts'
import { SpotifyProvider } from '../spotify.ts'
import { ZoomProvider } from '../zoom.ts'
import type { Provider } from '../types/provider.ts'
import type { User } from '../types/user.ts'

interface ProfileCase {
  id: string
  create: () => Provider
  profileUrl: string
  response: Record<string, unknown>
  expected: Partial<User>
}

const cases: ProfileCase[] = [
  {
    id: 'amazon',
    create: () => new AmazonProvider(providerOptions('amazon')),
    profileUrl: 'https://api.amazon.com/user/profile',
    response: {
      user_id: 'amzn1.account.A1',
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      postal_code: '98101',
    },
    expected: {
      userId: 'amzn1.account.A1',
      name: 'Ada Lovelace',
      nickName: 'Ada Lovelace',
      email: 'ada@example.com',
      location: '98101',
    },
  },
  {
    id: 'auth0',
    create: () =>
      new Auth0Provider({ ...providerOptions('auth0'), domain: 'example.eu.auth0.com' }),
    profileUrl: 'https://example.eu.auth0.com/userinfo',
    response: {
      sub: 'auth0|123',
      name: 'Ada Lovelace',
      nickname: 'ada',
      email: 'ada@example.com',
      picture: 'https://cdn.example.com/ada.png',
      given_name: 'Ada',
      family_name: 'Lovelace',
    },
    expected: {
      userId: 'auth0|123',
      name: 'Ada Lovelace',
      nickName: 'ada',
      firstName: 'Ada',
      lastName: 'Lovelace',
      avatarUrl: 'https://cdn.example.com/ada.png',
    },
  },
  {
    id: 'azureadv2',
    create: () => new AzureADV2Provider(providerOptions('azureadv2')),
    profileUrl: 'https://graph.microsoft.com/v1.0/me',
    response: {
      id: 'user-1',
      displayName: 'Ada Lovelace',
      givenName: 'Ada',
      surname: 'Lovelace',
      mail: null,
      userPrincipalName: 'ada@contoso.example',
      jobTitle: 'Engineer',
      officeLocation: null,
    },
    expected: {
      userId: 'user-1',
      name: 'Ada Lovelace',
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@contoso.example',
      nickName: 'ada@contoso.example',
      description: 'Engineer',
      location: '',
    },
  },
  {
    id: 'box',
    create: () => new BoxProvider(providerOptions('box')),
    profileUrl: 'https://api.box.com/2.0/users/me',
    response: {
      id: '11446498',
      name: 'Ada Lovelace',
      login: 'ada@example.com',
      address: 'London',
      avatar_url: 'https://app.box.com/api/avatar/large/11446498',
    },
    expected: {
      userId: '11446498',
      email: 'ada@example.com',
      nickName: 'Ada Lovelace',
      location: 'London',
      avatarUrl: 'https://app.box.com/api/avatar/large/11446498',
    },
  },
  {
    id: 'digitalocean',
    create: () => new DigitalOceanProvider(providerOptions('digitalocean')),
    profileUrl: 'https://api.digitalocean.com/v2/account',
    response: { account: { uuid: 'b6fr89dbf6d9156cace5f3c78dc9851d957381ef', email: 'ada@example.com' } },
    expected: {
      userId: 'b6fr89dbf6d9156cace5f3c78dc9851d957381ef',
      email: 'ada@example.com',
      name: '',
    },
  },
  {
    id: 'fitbit',
    create: () => new FitbitProvider(providerOptions('fitbit')),
    profileUrl: 'https://api.fitbit.com/1/user/-/profile.json',
    response: {
      user: {
        encodedId: '257V3V',
        avatar: 'https://static0.fitbit.com/ada.png',
        country: 'GB',
        fullName: 'Ada Lovelace',
        displayName: 'Ada',
        aboutMe: 'Runner',
      },
    },
    expected: {
      userId: '257V3V',
      location: 'GB',
      name: 'Ada Lovelace',
      nickName: 'Ada',
      avatarUrl: 'https://static0.fitbit.com/ada.png',
      description: 'Runner',
    },
  },
  {
    id: 'gitea',
    create: () =>
      new GiteaProvider({ ...providerOptions('gitea'), baseUrl: 'https://git.example.com/' }),
    profileUrl: 'https://git.example.com/api/v1/user',
    response: {
      id: 7,
      login: 'ada',
      full_name: 'Ada Lovelace',
      email: 'ada@example.com',
      avatar_url: 'https://git.example.com/avatars/7',
      location: 'London',
      description: 'Analyst',
    },
    expected: {
      userId: '7',
      nickName: 'ada',
      name: 'Ada Lovelace',
      location: 'London',
      description: 'Analyst',
    },
  },
  {
    id: 'gitlab',
    create: () => new GitLabProvider(providerOptions('gitlab')),
    profileUrl: 'https://gitlab.com/api/v4/user',
    response: {
      id: 42,
      username: 'ada',
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      avatar_url: 'https://gitlab.com/uploads/ada.png',
      location: 'London',
      bio: 'Analyst',
    },
    expected: {
      userId: '42',
      nickName: 'ada',
      email: 'ada@example.com',
      avatarUrl: 'https://gitlab.com/uploads/ada.png',
      description: 'Analyst',
    },
  },
  {
    id: 'heroku',
    create: () => new HerokuProvider(providerOptions('heroku')),
    profileUrl: 'https://api.heroku.com/account',
    response: { id: '01234567-89ab-cdef', email: 'ada@example.com', name: null },
    expected: { userId: '01234567-89ab-cdef', email: 'ada@example.com', name: '' },
  },
  {
    id: 'linkedin',
    create: () => new LinkedInProvider(providerOptions('linkedin')),
    profileUrl: 'https://api.linkedin.com/v2/userinfo',
    response: {
      sub: 'li-1',
      name: 'Ada Lovelace',
      given_name: 'Ada',
      family_name: 'Lovelace',
      email: 'ada@example.com',
      picture: 'https://media.licdn.example/ada.jpg',
      locale: { country: 'GB', language: 'en' },
    },
    expected: {
      userId: 'li-1',
      nickName: 'Ada',
      lastName: 'Lovelace',
      avatarUrl: 'https://media.licdn.example/ada.jpg',
      location: 'GB',
    },
  },
  {
    id: 'mastodon',
    create: () =>
      new MastodonProvider({
        ...providerOptions('mastodon'),
        instanceUrl: 'https://social.example.org',
      }),
    profileUrl: 'https://social.example.org/api/v1/accounts/verify_credentials',
    response: {
      id: '109',
      username: 'ada',
      acct: 'ada',
      display_name: 'Ada Lovelace',
      note: '<p>Analyst</p>',
      avatar: 'https://social.example.org/avatars/ada.png',
    },
    expected: {
      userId: '109',
      nickName: 'ada',
      name: 'Ada Lovelace',
      description: '<p>Analyst</p>',
      avatarUrl: 'https://social.example.org/avatars/ada.png',
      location: '',
    },
  },
  {
    id: 'microsoftonline',
    create: () => new MicrosoftOnlineProvider(providerOptions('microsoftonline')),
    profileUrl: 'https://graph.microsoft.com/v1.0/me',
    response: {
      id: 'ms-1',
      displayName: 'Ada Lovelace',
      givenName: 'Ada',
      surname: 'Lovelace',
      mail: 'ada@example.com',
      userPrincipalName: 'ada@contoso.example',
      officeLocation: 'Building 4',
    },
    expected: {
      userId: 'ms-1',
      email: 'ada@example.com',
      nickName: 'ada@contoso.example',
      location: 'Building 4',
      avatarUrl: MICROSOFT_GRAPH_PHOTO_URL,
    },
  },
  {
    id: 'okta',
    create: () =>
      new OktaProvider({ ...providerOptions('okta'), orgUrl: 'https://example.okta.com/' }),
    profileUrl: 'https://example.okta.com/oauth2/default/v1/userinfo',
    response: {
      sub: '00uid4BxXw6I6TV4m0g3',
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      given_name: 'Ada',
      family_name: 'Lovelace',
      preferred_username: 'ada@example.com',
    },
    expected: {
      userId: '00uid4BxXw6I6TV4m0g3',
      nickName: 'ada@example.com',
      firstName: 'Ada',
    },
  },
  {
    id: 'patreon',
    create: () => new PatreonProvider(providerOptions('patreon')),
    profileUrl: 'https://www.patreon.com/api/oauth2/v2/identity',
    response: {
      data: {
        id: '3000',
        attributes: {
          about: null,
          email: 'ada@example.com',
          first_name: 'Ada',
          full_name: 'Ada Lovelace',
          image_url: 'https://c8.patreon.example/ada.png',
          last_name: 'Lovelace',
          vanity: null,
        },
      },
    },
    expected: {
      userId: '3000',
      name: 'Ada Lovelace',
      nickName: '',
      description: '',
      avatarUrl: 'https://c8.patreon.example/ada.png',
    },
  },
  {
    id: 'spotify',
    create: () => new SpotifyProvider(providerOptions('spotify')),
    profileUrl: 'https://api.spotify.com/v1/me',
    response: {
      id: 'spotify-ada',
      display_name: null,
      email: 'ada@example.com',
      country: 'GB',
      images: [{ url: 'https://i.scdn.example/ada.jpg' }, { url: 'https://i.scdn.example/small.jpg' }],
    },
    expected: {
      userId: 'spotify-ada',
      name: '',
      location: 'GB',
      avatarUrl: 'https://i.scdn.example/ada.jpg',
    },
  },
  {
    id: 'zoom',
    create: () => new ZoomProvider(providerOptions('zoom')),
    profileUrl: 'https://api.zoom.us/v2/users/me',
    response: {
      id: 'KDcuGIm1QgePTO8WbOqwIQ',
      first_name: 'Ada',
      last_name: 'Lovelace',
      email: 'ada@example.com',
      pic_url: 'https://zoom.example/p/ada.jpg',
      location: 'London',
    },
    expected: {
      userId: 'KDcuGIm1QgePTO8WbOqwIQ',
      name: 'Ada Lovelace',
      avatarUrl: 'https://zoom.example/p/ada.jpg',
      location: 'London',
    },
  },
]

describe.each(cases)('$id profile', ({ id, create, profileUrl, response, expected }) => {
  it('should fetch the profile with a bearer token and map it onto a User', async () => {
    const fetchMock = mockFetch(jsonResponse(response))

    const user = await create().fetchUser(authorizedSession('access-1'))

    const request = requestAt(fetchMock, 0)
    expect(`${request.url.origin}${request.url.pathname}`).toBe(profileUrl)
    expect(request.headers.get('Authorization')).toBe('Bearer access-1')
    expect(user.provider).toBe(id)
    expect(user.accessToken).toBe('access-1')
    expect(user.refreshToken).toBe('refresh-1')
    expect(user.rawData).toEqual(response)
    expect(user).toMatchObject(expected)
  })

  it('should surface an error status from the profile endpoint', async () => {
    mockFetch(jsonResponse({ error: 'invalid_token' }, 401))

    await expect(create().fetchUser(authorizedSession())).rejects.toThrow(
      `${id} responded with a 401 trying to fetch user information`,
    )
  })
})
