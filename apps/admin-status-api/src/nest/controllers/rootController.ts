import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {sendRedirect} from '../../http'
import {ADMIN_ROUTES, DOCUMENTATION_PATHS, toOperationName} from '../../routes'
import {AdminStatusControllerContext} from '../controllerContext'

@Controller()
export class RootController {
  public constructor(@Inject(AdminStatusControllerContext) private readonly context: AdminStatusControllerContext) {}

  @Get(ADMIN_ROUTES.root.path)
  public async redirect(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      operation: toOperationName(ADMIN_ROUTES.root),
      handler: ({correlationId}) => {
        sendRedirect({
          response,
          location: DOCUMENTATION_PATHS.ui,
          correlationId
        })
      }
    })
  }
}
