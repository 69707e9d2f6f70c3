import 'reflect-metadata'

import {createStructuredLogger} from '@credential-agent/logging'

import {createAdminStatusServer} from './app'
import {loadConfig} from './config'

export const appName = 'admin-status-api'

const main = async () => {
  const config = loadConfig(process.env)
  const server = await createAdminStatusServer({
    config,
    rootProfile: {
      name: 'root',
      settings: {
        label: config.documentation.agentLabel
      }
    }
  })

  await server.start()

  let exiting = false
  const exitAfterStop = async (code: number) => {
    if (exiting) {
      return
    }

    exiting = true
    await server.stop()
    process.exit(code)
  }

  process.on('SIGINT', () => {
    void exitAfterStop(0)
  })
  process.on('SIGTERM', () => {
    void exitAfterStop(0)
  })
  // Status checks report the failure until the listener is closed.
  process.on('uncaughtException', () => {
    server.notifyFatalError()
    void exitAfterStop(1)
  })
}

void main().catch(error => {
  const env =
    process.env.NODE_ENV === 'production'
      ? 'production'
      : process.env.NODE_ENV === 'test'
        ? 'test'
        : 'development'
  const startupLogger = createStructuredLogger({
    service: appName,
    env,
    level: 'error'
  })
  startupLogger.fatal({
    event: 'process.startup.failed',
    component: 'process.entrypoint',
    message: 'Admin status server startup failed',
    reason_code: 'startup_failed',
    metadata: {
      error
    }
  })
  process.exit(1)
})
