import {describe, expect, it} from 'vitest'

import {
  apiKeysMatch,
  createApiKeyAuthGate,
  createAuthGateFromConfig,
  createInsecureAuthGate,
  isUnprotectedPath
} from '../auth'

describe('auth', () => {
  it('matches only the exact configured key', () => {
    expect(apiKeysMatch('test-secret', 'test-secret')).toBe(true)
    expect(apiKeysMatch('test-secret', 'test-secre')).toBe(false)
    expect(apiKeysMatch('test-secret', 'test-secret-longer')).toBe(false)
    expect(apiKeysMatch('test-secret', '')).toBe(false)
    expect(apiKeysMatch('test-secret', undefined)).toBe(false)
  })

  it('treats allow-list entries ending in a slash as prefixes', () => {
    const unprotectedPaths = ['/api/doc', '/static/swagger/']

    expect(isUnprotectedPath({pathname: '/api/doc', unprotectedPaths})).toBe(true)
    expect(isUnprotectedPath({pathname: '/api/doc/index.css', unprotectedPaths})).toBe(false)
    expect(isUnprotectedPath({pathname: '/static/swagger/ui.js', unprotectedPaths})).toBe(true)
    expect(isUnprotectedPath({pathname: '/static/other.js', unprotectedPaths})).toBe(false)
  })

  it('authorizes requests with the configured key or an exempt path', () => {
    const gate = createApiKeyAuthGate({apiKey: 'test-secret', unprotectedPaths: ['/api/doc']})

    expect(gate.mode).toBe('api_key')
    expect(gate.isAuthorized({method: 'GET', pathname: '/status/live', apiKey: 'test-secret'})).toBe(true)
    expect(gate.isAuthorized({method: 'GET', pathname: '/status/live', apiKey: 'wrong-secret'})).toBe(false)
    expect(gate.isAuthorized({method: 'GET', pathname: '/status/live', apiKey: undefined})).toBe(false)
    expect(gate.isAuthorized({method: 'GET', pathname: '/api/doc', apiKey: undefined})).toBe(true)
  })

  it('authorizes everything in insecure mode', () => {
    const gate = createInsecureAuthGate()
    expect(gate.mode).toBe('insecure')
    expect(gate.isAuthorized({method: 'POST', pathname: '/status/reset', apiKey: undefined})).toBe(true)
  })

  it('builds the gate matching the auth config', () => {
    expect(createAuthGateFromConfig({mode: 'insecure'}).mode).toBe('insecure')

    const gate = createAuthGateFromConfig({mode: 'api_key', apiKey: 'test-secret', unprotectedPaths: []})
    expect(gate.mode).toBe('api_key')
    expect(gate.isAuthorized({method: 'GET', pathname: '/api/doc', apiKey: undefined})).toBe(false)
  })
})
