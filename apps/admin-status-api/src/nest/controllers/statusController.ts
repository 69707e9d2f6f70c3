import {Controller, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {
  AdminResetSchema,
  AdminStatusLivenessSchema,
  AdminStatusReadinessSchema
} from '@credential-agent/schemas'

import {methodNotAllowed, serviceUnavailable} from '../../errors'
import {sendJson} from '../../http'
import {ADMIN_ROUTES, toOperationName} from '../../routes'
import {AdminStatusControllerContext} from '../controllerContext'

// Express answers HEAD through GET routes; the status checks take GET only.
const rejectHead = ({method, response}: {method: string; response: Response}) => {
  if (method === 'HEAD') {
    response.setHeader('allow', 'GET')
    throw methodNotAllowed('method_not_allowed', 'Method not allowed')
  }
}

@Controller()
export class StatusController {
  public constructor(@Inject(AdminStatusControllerContext) private readonly context: AdminStatusControllerContext) {}

  @Get(ADMIN_ROUTES.liveness.path)
  public async liveness(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      operation: toOperationName(ADMIN_ROUTES.liveness),
      handler: ({correlationId, method}) => {
        rejectHead({method, response})
        if (!this.context.runtime.state.isLive()) {
          throw serviceUnavailable('service_not_available', 'Service not available')
        }

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: AdminStatusLivenessSchema.parse({alive: true})
        })
      }
    })
  }

  @Get(ADMIN_ROUTES.readiness.path)
  public async readiness(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      operation: toOperationName(ADMIN_ROUTES.readiness),
      handler: ({correlationId, method}) => {
        rejectHead({method, response})
        if (!this.context.runtime.state.isReady()) {
          throw serviceUnavailable('service_not_ready', 'Service not ready')
        }

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: AdminStatusReadinessSchema.parse({ready: true})
        })
      }
    })
  }

  @Post(ADMIN_ROUTES.statusReset.path)
  public async reset(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        this.context.runtime.collector?.reset()

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: AdminResetSchema.parse({})
        })
      }
    })
  }
}
