/**
 * @file Host Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import {
  hasCredentials,
  hostConfigFromEnv,
  parseHostConfig,
} from '../../src/config/host-config.js'

describe('parseHostConfig()', () => {
  it('should default the scheme to http', () => {
    expect(parseHostConfig({ address: 'media-box', httpPort: 8080 })).toEqual({
      address: 'media-box',
      httpPort: 8080,
      scheme: 'http',
    })
  })

  it('should keep an explicit scheme and credentials', () => {
    const config = parseHostConfig({
      address: 'media-box',
      httpPort: 8443,
      scheme: 'https',
      username: 'admin',
      password: 'test-secret',
    })

    expect(config.scheme).toBe('https')
    expect(config.username).toBe('admin')
    expect(config.password).toBe('test-secret')
  })

  it('should trim the address', () => {
    expect(parseHostConfig({ address: '  media-box ', httpPort: 8080 }).address).toBe('media-box')
  })

  it('should coerce a numeric port string', () => {
    expect(parseHostConfig({ address: 'media-box', httpPort: '9090' }).httpPort).toBe(9090)
  })

  it('should reject an empty address', () => {
    expect(() => parseHostConfig({ address: '   ', httpPort: 8080 })).toThrow(ZodError)
  })

  it.each([0, 65536, 80.5])('should reject port %s', (httpPort) => {
    expect(() => parseHostConfig({ address: 'media-box', httpPort })).toThrow(ZodError)
  })

  it('should reject an unknown scheme', () => {
    expect(() =>
      parseHostConfig({ address: 'media-box', httpPort: 8080, scheme: 'ftp' })
    ).toThrow(ZodError)
  })
})

describe('hostConfigFromEnv()', () => {
  it('should read the JSONRPC_ variables', () => {
    const config = hostConfigFromEnv({
      JSONRPC_HOST: '192.168.1.20',
      JSONRPC_PORT: '8080',
      JSONRPC_USERNAME: 'admin',
      JSONRPC_PASSWORD: 'test-secret',
    })

    expect(config).toEqual({
      address: '192.168.1.20',
      httpPort: 8080,
      scheme: 'http',
      username: 'admin',
      password: 'test-secret',
    })
  })

  it('should honour a custom prefix', () => {
    const config = hostConfigFromEnv(
      { MEDIA_HOST: 'media-box', MEDIA_PORT: '443', MEDIA_SCHEME: 'https' },
      'MEDIA_'
    )

    expect(config).toEqual({ address: 'media-box', httpPort: 443, scheme: 'https' })
  })

  it('should treat an empty scheme as unset', () => {
    const config = hostConfigFromEnv({
      JSONRPC_HOST: 'media-box',
      JSONRPC_PORT: '8080',
      JSONRPC_SCHEME: '',
    })

    expect(config.scheme).toBe('http')
  })

  it('should fail when the host is missing', () => {
    expect(() => hostConfigFromEnv({ JSONRPC_PORT: '8080' })).toThrow(ZodError)
  })
})

describe('hasCredentials()', () => {
  it('should be true when username and password are set', () => {
    expect(hasCredentials({ username: 'admin', password: 'test-secret' })).toBe(true)
  })

  it('should be false without a password', () => {
    expect(hasCredentials({ username: 'admin' })).toBe(false)
  })

  it('should be false with an empty username', () => {
    expect(hasCredentials({ username: '', password: 'test-secret' })).toBe(false)
  })
})
