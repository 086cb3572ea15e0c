/**
 * Profile information common to most OAuth1 and OAuth2 providers.
 * Everything the provider returned is kept in `rawData`.
 */
export interface User {
  rawData: Record<string, unknown>
  provider: string
  email: string
  name: string
  firstName: string
  lastName: string
  nickName: string
  description: string
  userId: string
  avatarUrl: string
  location: string
  accessToken: string
  accessTokenSecret: string
  refreshToken: string
  expiresAt?: Date
  idToken: string
}

export type UserFields = Partial<Omit<User, 'provider'>>

export const createUser = (provider: string, fields: UserFields = {}): User => ({
  rawData: fields.rawData ?? {},
  provider,
  email: fields.email ?? '',
  name: fields.name ?? '',
  firstName: fields.firstName ?? '',
  lastName: fields.lastName ?? '',
  nickName: fields.nickName ?? '',
  description: fields.description ?? '',
  userId: fields.userId ?? '',
  avatarUrl: fields.avatarUrl ?? '',
  location: fields.location ?? '',
  accessToken: fields.accessToken ?? '',
  accessTokenSecret: fields.accessTokenSecret ?? '',
  refreshToken: fields.refreshToken ?? '',
  expiresAt: fields.expiresAt,
  idToken: fields.idToken ?? '',
})
