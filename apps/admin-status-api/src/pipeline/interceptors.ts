import type {IncomingMessage} from 'node:http'

import {setLogContextFields} from '@credential-agent/logging'

import type {AdminAuthGate} from '../auth'
import {internal, payloadTooLarge, serviceUnavailable, unauthorized} from '../errors'
import {getSingleHeaderValue} from '../http'
import {AdminRequestContext, attachAdminRequestContext, type AdminProfile} from '../profile'
import {ADMIN_ROUTES} from '../routes'
import type {ServerState} from '../state'

export type InterceptorContext = {
  request: IncomingMessage
  method: string
  pathname: string
  correlationId: string
}

/**
 * One step of the admin request pipeline. Throwing an `AppError` short-circuits the
 * pipeline and becomes the response; calling `next` hands the request on.
 */
export type AdminRequestInterceptor = (context: InterceptorContext, next: () => Promise<void>) => Promise<void>

export const runInterceptors = async ({
  interceptors,
  context,
  terminal
}: {
  interceptors: readonly AdminRequestInterceptor[]
  context: InterceptorContext
  terminal: () => Promise<void>
}) => {
  const dispatch = async (index: number): Promise<void> => {
    const interceptor = interceptors.at(index)
    if (!interceptor) {
      await terminal()
      return
    }

    let nextCalled = false
    await interceptor(context, async () => {
      if (nextCalled) {
        throw internal('interceptor_next_repeated', 'Interceptor called next more than once')
      }

      nextCalled = true
      await dispatch(index + 1)
    })
  }

  await dispatch(0)
}

const readinessExemptPaths: readonly string[] = [ADMIN_ROUTES.liveness.path, ADMIN_ROUTES.readiness.path]

// Express matches routes case-insensitively, so the exemption does too.
const normalizeGatePath = (pathname: string) => pathname.replace(/\/+$/u, '').toLowerCase() || '/'

export const createReadyGateInterceptor =
  ({state}: {state: ServerState}): AdminRequestInterceptor =>
  async ({pathname}, next) => {
    if (!state.isReady() && !readinessExemptPaths.includes(normalizeGatePath(pathname))) {
      throw serviceUnavailable('shutdown_in_progress', 'Shutdown in progress')
    }

    await next()
  }

// Browsers never attach x-api-key to a CORS preflight, so OPTIONS is not gated.
export const createAuthenticationInterceptor =
  ({authGate}: {authGate: AdminAuthGate}): AdminRequestInterceptor =>
  async ({request, method, pathname}, next) => {
    if (method === 'OPTIONS') {
      await next()
      return
    }

    const authorized = authGate.isAuthorized({
      method,
      pathname,
      apiKey: getSingleHeaderValue({request, name: 'x-api-key'})
    })
    if (!authorized) {
      throw unauthorized('admin_auth_invalid', 'Unauthorized')
    }

    await next()
  }

export const createRequestSizeInterceptor =
  ({maxRequestBytes}: {maxRequestBytes: number}): AdminRequestInterceptor =>
  async ({request}, next) => {
    const rawLength = getSingleHeaderValue({request, name: 'content-length'})
    const declaredLength = rawLength === undefined ? 0 : Number.parseInt(rawLength, 10)
    if (Number.isFinite(declaredLength) && declaredLength > maxRequestBytes) {
      throw payloadTooLarge('request_body_too_large', `Request body exceeds ${String(maxRequestBytes)} bytes`)
    }

    await next()
  }

export const createContextAttachmentInterceptor =
  ({profile}: {profile: AdminProfile}): AdminRequestInterceptor =>
  async ({request}, next) => {
    attachAdminRequestContext(request, new AdminRequestContext(profile))
    setLogContextFields({profile: profile.name})
    await next()
  }

export const createDefaultInterceptors = ({
  state,
  authGate,
  profile,
  maxRequestBytes
}: {
  state: ServerState
  authGate: AdminAuthGate
  profile: AdminProfile
  maxRequestBytes: number
}): AdminRequestInterceptor[] => [
  createReadyGateInterceptor({state}),
  createAuthenticationInterceptor({authGate}),
  createRequestSizeInterceptor({maxRequestBytes}),
  createContextAttachmentInterceptor({profile})
]
