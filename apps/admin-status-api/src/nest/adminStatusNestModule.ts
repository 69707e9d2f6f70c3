import {Module, type DynamicModule} from '@nestjs/common'

import type {AdminStatusRuntime} from '../runtime'
import {AdminStatusControllerContext} from './controllerContext'
import {DocumentationController} from './controllers/documentationController'
import {FallbackController} from './controllers/fallbackController'
import {RootController} from './controllers/rootController'
import {StatusController} from './controllers/statusController'
import {ADMIN_STATUS_API_RUNTIME} from './tokens'

// FallbackController must stay last so its catch-all route is registered after the others.
@Module({
  controllers: [RootController, StatusController, DocumentationController, FallbackController]
})
export class AdminStatusNestModule {
  public static register(runtime: AdminStatusRuntime): DynamicModule {
    return {
      module: AdminStatusNestModule,
      providers: [
        {
          provide: ADMIN_STATUS_API_RUNTIME,
          useValue: runtime
        },
        {
          provide: AdminStatusControllerContext,
          inject: [ADMIN_STATUS_API_RUNTIME],
          useFactory: (value: AdminStatusRuntime) => new AdminStatusControllerContext(value)
        }
      ]
    }
  }
}
