import { describe, it, expect } from 'vitest'
import { loadConfig } from '../config'

describe('loadConfig', () => {
  it('should use the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      githubToken: null,
      apiBaseUrl: 'https://api.github.com',
      rawBaseUrl: 'https://raw.githubusercontent.com',
      debug: false,
    })
  })

  it('should read overrides and trim trailing slashes', () => {
    expect(
      loadConfig({
        PORT: '8080',
        GITHUB_TOKEN: ' test-token ',
        GITHUB_API_URL: 'https://ghe.example/api/v3/',
        GITHUB_RAW_URL: 'https://ghe.example/raw/',
        DEBUG: 'true',
      })
    ).toEqual({
      port: 8080,
      githubToken: 'test-token',
      apiBaseUrl: 'https://ghe.example/api/v3',
      rawBaseUrl: 'https://ghe.example/raw',
      debug: true,
    })
  })

  it('should treat an empty token as no credential', () => {
    expect(loadConfig({ GITHUB_TOKEN: '' }).githubToken).toBeNull()
  })

  it('should reject an invalid port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Invalid PORT: abc')
  })
})
