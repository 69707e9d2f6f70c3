import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {AdminErrorSchema} from '@credential-agent/schemas'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cache-control': 'no-store'
}

export const getSingleHeaderValue = ({
  request,
  name
}: {
  request: IncomingMessage
  name: 'x-api-key' | 'x-correlation-id' | 'content-length'
}): string | undefined => {
  const headerValue = request.headers[name]
  if (Array.isArray(headerValue)) {
    return headerValue[0]
  }

  return headerValue
}

export const extractCorrelationId = (request: IncomingMessage) => {
  const value = getSingleHeaderValue({request, name: 'x-correlation-id'})
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
  headers?: Record<string, string>
}) => {
  const body = serialize(payload)

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    'x-correlation-id': correlationId,
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  reason,
  correlationId
}: {
  response: ServerResponse
  status: number
  error: string
  reason: string
  correlationId: string
}) => {
  const payload = AdminErrorSchema.parse({
    error,
    reason,
    correlation_id: correlationId
  })

  sendJson({
    response,
    status,
    payload,
    correlationId
  })
}

export const sendRedirect = ({
  response,
  location,
  correlationId
}: {
  response: ServerResponse
  location: string
  correlationId: string
}) => {
  response.writeHead(302, {
    ...DEFAULT_SECURITY_HEADERS,
    location,
    'content-length': '0',
    'x-correlation-id': correlationId
  })

  response.end()
}
