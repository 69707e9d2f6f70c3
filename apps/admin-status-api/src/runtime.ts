import type {StructuredLogger} from '@credential-agent/logging'
import type {OpenAPIV3} from 'openapi-types'

import type {TimingCollector} from './collector'
import type {ServerState} from './state'

/**
 * Everything the route handlers of one admin status server share. `collector` is
 * absent when statistics are not collected.
 */
export type AdminStatusRuntime = {
  state: ServerState
  collector?: TimingCollector
  logger: StructuredLogger
  openApiDocument: OpenAPIV3.Document
  now: () => Date
}
