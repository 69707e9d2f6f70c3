import {Inject, Injectable} from '@nestjs/common'
import type {Request, Response} from 'express'
import {getLogContext} from '@credential-agent/logging'

import {extractCorrelationId} from '../http'
import {respondWithError} from '../pipeline/errorResponse'
import type {AdminStatusRuntime} from '../runtime'
import {ADMIN_STATUS_API_RUNTIME} from './tokens'

export type RequestHandlerContext = {
  correlationId: string
  method: string
  pathname: string
}

@Injectable()
export class AdminStatusControllerContext {
  public constructor(@Inject(ADMIN_STATUS_API_RUNTIME) public readonly runtime: AdminStatusRuntime) {}

  /**
   * Runs one route handler. Thrown `AppError`s become the error envelope, anything else a
   * 500. When `operation` is given the handler duration is recorded under it.
   */
  public async handleRequest({
    request,
    response,
    operation,
    handler
  }: {
    request: Request
    response: Response
    operation?: string
    handler: (context: RequestHandlerContext) => void | Promise<void>
  }) {
    const correlationId = getLogContext()?.correlation_id ?? extractCorrelationId(request)
    const method = request.method
    const pathname = request.path
    const startedAtMs = this.runtime.now().getTime()

    try {
      await handler({correlationId, method, pathname})
    } catch (error) {
      respondWithError({
        error,
        response,
        correlationId,
        logger: this.runtime.logger,
        component: 'http.server',
        route: pathname,
        method
      })
    } finally {
      if (operation) {
        this.runtime.collector?.record(operation, this.runtime.now().getTime() - startedAtMs)
      }
    }
  }
}
