import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@prefab-gateway/logging'

import {appName, createGatewayApp} from './app'
import {loadConfig} from './config'

export * from './app'
export * from './auth'
export * from './config'
export * from './deployments'
export * from './errors'
export * from './http'
export * from './infrastructure'
export * from './runtime'

const main = async () => {
  const config = loadConfig(process.env)
  const app = await createGatewayApp({config})

  await app.start()

  // in-flight jobs close their workspaces on the way out; the sweeper reclaims anything left behind
  const shutdown = async (signal: NodeJS.Signals) => {
    app.logger.info({
      event: 'process.stopping',
      component: 'process.entrypoint',
      message: `Received ${signal}, shutting down`
    })
    await app.stop()
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal)
    })
  }
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Gateway startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
