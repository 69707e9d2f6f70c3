import {IncomingMessage} from 'node:http'
import {Socket} from 'node:net'

import {describe, expect, it} from 'vitest'
import {getLogContext, runWithLogContext} from '@credential-agent/logging'

import {createApiKeyAuthGate} from '../auth'
import {isAppError} from '../errors'
import {
  createAuthenticationInterceptor,
  createContextAttachmentInterceptor,
  createReadyGateInterceptor,
  createRequestSizeInterceptor,
  runInterceptors,
  type AdminRequestInterceptor,
  type InterceptorContext
} from '../pipeline/interceptors'
import {getAdminRequestContext} from '../profile'
import {ServerState} from '../state'

const makeContext = ({
  method = 'GET',
  pathname = '/status/live',
  headers = {}
}: {
  method?: string
  pathname?: string
  headers?: Record<string, string>
} = {}): InterceptorContext => {
  const request = new IncomingMessage(new Socket())
  request.method = method
  request.url = pathname
  for (const [name, value] of Object.entries(headers)) {
    request.headers[name] = value
  }
  return {request, method, pathname, correlationId: 'corr-test'}
}

const captureRejection = async (operation: () => Promise<void>) => {
  try {
    await operation()
  } catch (error) {
    return error
  }

  throw new Error('expected operation to reject')
}

const readyState = () => {
  const state = new ServerState()
  state.setAlive(true)
  state.setReady(true)
  return state
}

const passThrough = async () => undefined

describe('interceptor chain', () => {
  it('runs interceptors in order before the terminal handler', async () => {
    const calls: string[] = []
    const record =
      (name: string): AdminRequestInterceptor =>
      async (_context, next) => {
        calls.push(`${name}:before`)
        await next()
        calls.push(`${name}:after`)
      }

    await runInterceptors({
      interceptors: [record('first'), record('second')],
      context: makeContext(),
      terminal: async () => {
        calls.push('terminal')
      }
    })

    expect(calls).toEqual(['first:before', 'second:before', 'terminal', 'second:after', 'first:after'])
  })

  it('stops the chain when an interceptor throws', async () => {
    let terminalCalled = false
    const failure = new Error('stop here')

    const error = await captureRejection(() =>
      runInterceptors({
        interceptors: [
          async () => {
            throw failure
          }
        ],
        context: makeContext(),
        terminal: async () => {
          terminalCalled = true
        }
      })
    )

    expect(error).toBe(failure)
    expect(terminalCalled).toBe(false)
  })

  it('rejects an interceptor that calls next twice', async () => {
    const error = await captureRejection(() =>
      runInterceptors({
        interceptors: [
          async (_context, next) => {
            await next()
            await next()
          }
        ],
        context: makeContext(),
        terminal: passThrough
      })
    )

    expect(isAppError(error) && error.code).toBe('interceptor_next_repeated')
  })
})

describe('ready gate interceptor', () => {
  it('passes every request while ready', async () => {
    const interceptor = createReadyGateInterceptor({state: readyState()})
    await expect(interceptor(makeContext({pathname: '/api/doc'}), passThrough)).resolves.toBeUndefined()
  })

  it('rejects non-status routes once not ready', async () => {
    const state = readyState()
    state.setReady(false)
    const interceptor = createReadyGateInterceptor({state})

    const error = await captureRejection(() => interceptor(makeContext({pathname: '/status/reset'}), passThrough))
    if (!isAppError(error)) {
      throw new Error('expected app error')
    }
    expect(error.status).toBe(503)
    expect(error.code).toBe('shutdown_in_progress')
    expect(error.message).toBe('Shutdown in progress')
  })

  it('keeps the status checks reachable when not ready', async () => {
    const interceptor = createReadyGateInterceptor({state: new ServerState()})

    await expect(interceptor(makeContext({pathname: '/status/live'}), passThrough)).resolves.toBeUndefined()
    await expect(interceptor(makeContext({pathname: '/status/ready/'}), passThrough)).resolves.toBeUndefined()
  })

  it('matches the status paths regardless of case', async () => {
    const interceptor = createReadyGateInterceptor({state: new ServerState()})

    await expect(interceptor(makeContext({pathname: '/STATUS/LIVE'}), passThrough)).resolves.toBeUndefined()
    await expect(interceptor(makeContext({pathname: '/Status/Ready/'}), passThrough)).resolves.toBeUndefined()

    const error = await captureRejection(() => interceptor(makeContext({pathname: '/STATUS/RESET'}), passThrough))
    expect(isAppError(error) && error.code).toBe('shutdown_in_progress')
  })
})

describe('authentication interceptor', () => {
  const interceptor = createAuthenticationInterceptor({
    authGate: createApiKeyAuthGate({apiKey: 'test-secret', unprotectedPaths: ['/api/doc']})
  })

  it('accepts the configured key', async () => {
    await expect(
      interceptor(makeContext({headers: {'x-api-key': 'test-secret'}}), passThrough)
    ).resolves.toBeUndefined()
  })

  it('rejects a missing or wrong key', async () => {
    const headerCases: Record<string, string>[] = [{}, {'x-api-key': 'wrong-secret'}]
    for (const headers of headerCases) {
      const error = await captureRejection(() => interceptor(makeContext({headers}), passThrough))
      if (!isAppError(error)) {
        throw new Error('expected app error')
      }
      expect(error.status).toBe(401)
      expect(error.code).toBe('admin_auth_invalid')
      expect(error.message).toBe('Unauthorized')
    }
  })

  it('lets OPTIONS requests through without a key', async () => {
    await expect(
      interceptor(makeContext({method: 'OPTIONS', headers: {'x-api-key': 'wrong-secret'}}), passThrough)
    ).resolves.toBeUndefined()
  })

  it('lets allow-listed paths through without a key', async () => {
    await expect(interceptor(makeContext({pathname: '/api/doc'}), passThrough)).resolves.toBeUndefined()
  })
})

describe('request size interceptor', () => {
  const interceptor = createRequestSizeInterceptor({maxRequestBytes: 1024})

  it('rejects a declared body over the limit', async () => {
    const error = await captureRejection(() =>
      interceptor(makeContext({method: 'POST', headers: {'content-length': '2048'}}), passThrough)
    )
    if (!isAppError(error)) {
      throw new Error('expected app error')
    }
    expect(error.status).toBe(413)
    expect(error.code).toBe('request_body_too_large')
    expect(error.message).toBe('Request body exceeds 1024 bytes')
  })

  it('accepts bodies within the limit and requests without a body', async () => {
    await expect(
      interceptor(makeContext({method: 'POST', headers: {'content-length': '1024'}}), passThrough)
    ).resolves.toBeUndefined()
    await expect(interceptor(makeContext(), passThrough)).resolves.toBeUndefined()
  })
})

describe('context attachment interceptor', () => {
  it('attaches the root profile and tags the log context', async () => {
    const profile = {name: 'root', settings: {label: 'Credential Agent'}}
    const interceptor = createContextAttachmentInterceptor({profile})
    const context = makeContext()

    await runWithLogContext({correlation_id: 'corr-test', request_id: 'req-test'}, async () => {
      await interceptor(context, async () => {
        expect(getLogContext()?.profile).toBe('root')
      })
    })

    expect(getAdminRequestContext(context.request)?.profile).toBe(profile)
  })
})
