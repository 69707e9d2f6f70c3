import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {sendJson} from '../../http'
import {DOCUMENTATION_PATHS} from '../../routes'
import {AdminStatusControllerContext} from '../controllerContext'

@Controller()
export class DocumentationController {
  public constructor(@Inject(AdminStatusControllerContext) private readonly context: AdminStatusControllerContext) {}

  @Get(DOCUMENTATION_PATHS.document)
  public async document(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        sendJson({
          response,
          status: 200,
          correlationId,
          payload: this.context.runtime.openApiDocument
        })
      }
    })
  }
}
