import { afterEach, describe, expect, it, vi } from 'vitest'
import { getDatabaseConfig } from '../config.ts'

const SCYLLA_VARS = [
  'SCYLLA_HOSTS',
  'SCYLLA_PORT',
  'SCYLLA_KEYSPACE',
  'SCYLLA_LOCAL_DATACENTER',
  'SCYLLA_USERNAME',
  'SCYLLA_PASSWORD',
  'SCYLLA_SSL',
  'SCYLLA_CONNECT_TIMEOUT_MS',
  'SCYLLA_CONNECT_RETRIES',
  'SCYLLA_CONNECT_RETRY_DELAY_MS',
]

const clearScyllaEnv = () => {
  for (const name of SCYLLA_VARS) {
    vi.stubEnv(name, '')
  }
}

describe('getDatabaseConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('should default to a local single-node cluster', () => {
    clearScyllaEnv()

    expect(getDatabaseConfig()).toEqual({
      hosts: ['localhost'],
      port: 9042,
      keyspace: 'multiauth',
      localDataCenter: 'datacenter1',
      username: undefined,
      password: undefined,
      isSslEnabled: false,
      connectTimeoutMs: 10_000,
      connectRetries: 3,
      connectRetryDelayMs: 1_000,
    })
  })

  it('should read a trimmed host list and credentials', () => {
    clearScyllaEnv()
    vi.stubEnv('SCYLLA_HOSTS', 'host1, host2 ,host3 ')
    vi.stubEnv('SCYLLA_PORT', '19042')
    vi.stubEnv('SCYLLA_KEYSPACE', ' auth_sessions_ks ')
    vi.stubEnv('SCYLLA_LOCAL_DATACENTER', 'dc-custom')
    vi.stubEnv('SCYLLA_USERNAME', 'auth')
    vi.stubEnv('SCYLLA_PASSWORD', 'test-password')
    vi.stubEnv('SCYLLA_SSL', 'true')
    vi.stubEnv('SCYLLA_CONNECT_RETRIES', '5')

    const config = getDatabaseConfig()

    expect(config.hosts).toEqual(['host1', 'host2', 'host3'])
    expect(config.port).toBe(19042)
    expect(config.keyspace).toBe('auth_sessions_ks')
    expect(config.localDataCenter).toBe('dc-custom')
    expect(config.username).toBe('auth')
    expect(config.password).toBe('test-password')
    expect(config.isSslEnabled).toBe(true)
    expect(config.connectRetries).toBe(5)
  })

  it('should fall back to localhost when the host list is blank', () => {
    clearScyllaEnv()
    vi.stubEnv('SCYLLA_HOSTS', ' , ')

    expect(getDatabaseConfig().hosts).toEqual(['localhost'])
  })

  it('should ignore unparseable numbers', () => {
    clearScyllaEnv()
    vi.stubEnv('SCYLLA_PORT', 'not-a-number')
    vi.stubEnv('SCYLLA_CONNECT_RETRY_DELAY_MS', 'soon')

    const config = getDatabaseConfig()

    expect(config.port).toBe(9042)
    expect(config.connectRetryDelayMs).toBe(1_000)
  })
})
