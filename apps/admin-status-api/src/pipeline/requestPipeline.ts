import {randomUUID} from 'node:crypto'

import type {NextFunction, Request, Response} from 'express'
import {runWithLogContext, type StructuredLogger} from '@credential-agent/logging'

import {extractCorrelationId} from '../http'
import {respondWithError} from './errorResponse'
import {runInterceptors, type AdminRequestInterceptor} from './interceptors'

const component = 'http.pipeline'

/**
 * Express middleware that opens the per-request log context, runs every interceptor in
 * order and only then hands the request on to the routes. A rejected interceptor ends
 * the request with the JSON error envelope.
 */
export const createAdminRequestPipeline = ({
  interceptors,
  logger,
  now = () => new Date()
}: {
  interceptors: readonly AdminRequestInterceptor[]
  logger: StructuredLogger
  now?: () => Date
}) => {
  return (request: Request, response: Response, next: NextFunction) => {
    const correlationId = extractCorrelationId(request)
    const requestId = randomUUID()
    const method = request.method
    const pathname = request.path
    const startedAtMs = now().getTime()

    response.setHeader('x-correlation-id', correlationId)
    response.once('finish', () => {
      const statusCode = response.statusCode
      const baseLog = {
        event: 'request.completed',
        component,
        message: 'Request completed',
        correlation_id: correlationId,
        request_id: requestId,
        route: pathname,
        method,
        status_code: statusCode,
        duration_ms: Math.max(0, now().getTime() - startedAtMs)
      }

      if (statusCode >= 500) {
        logger.error(baseLog)
      } else if (statusCode >= 400) {
        logger.warn(baseLog)
      } else {
        logger.info(baseLog)
      }
    })

    runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        route: pathname,
        method
      },
      () => {
        logger.info({
          event: 'request.received',
          component,
          message: 'Request received'
        })

        void runInterceptors({
          interceptors,
          context: {request, method, pathname, correlationId},
          terminal: async () => {
            next()
          }
        }).catch((error: unknown) => {
          respondWithError({
            error,
            response,
            correlationId,
            logger,
            component,
            route: pathname,
            method
          })
        })
      }
    )
  }
}
