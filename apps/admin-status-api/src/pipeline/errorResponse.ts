import type {ServerResponse} from 'node:http'

import type {StructuredLogger} from '@credential-agent/logging'

import {isAppError} from '../errors'
import {sendError} from '../http'

export const respondWithError = ({
  error,
  response,
  correlationId,
  logger,
  component,
  route,
  method
}: {
  error: unknown
  response: ServerResponse
  correlationId: string
  logger: StructuredLogger
  component: string
  route: string
  method: string
}) => {
  if (isAppError(error)) {
    logger.warn({
      event: 'request.rejected',
      component,
      message: `Request rejected: ${error.code}`,
      reason_code: error.code,
      route,
      method
    })
  } else {
    logger.error({
      event: 'request.failed',
      component,
      message: 'Unexpected internal error',
      reason_code: 'internal_error',
      route,
      method,
      metadata: {
        error
      }
    })
  }

  if (response.headersSent) {
    response.end()
    return
  }

  if (isAppError(error)) {
    sendError({
      response,
      status: error.status,
      error: error.code,
      reason: error.message,
      correlationId
    })
    return
  }

  sendError({
    response,
    status: 500,
    error: 'internal_error',
    reason: 'Unexpected internal error',
    correlationId
  })
}
