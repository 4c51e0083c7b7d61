import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@reality-reconciler/logging'

import {runCli} from './cli.js'
import {appName} from './infrastructure.js'
import {EXIT_CODES} from './outcome.js'

export * from './cli.js'
export * from './commands.js'
export * from './config.js'
export * from './credentials.js'
export * from './infrastructure.js'
export * from './outcome.js'
export * from './reconcile.js'
export * from './steps.js'

const main = async () => {
  const controller = new AbortController()
  const cancel = () => {
    controller.abort()
  }
  process.once('SIGINT', cancel)
  process.once('SIGTERM', cancel)

  try {
    process.exitCode = await runCli({
      argv: process.argv.slice(2),
      env: process.env,
      stdout: process.stdout,
      signal: controller.signal
    })
  } finally {
    process.off('SIGINT', cancel)
    process.off('SIGTERM', cancel)
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
    createStructuredLogger({service: appName, env: 'production', level: 'error'}).fatal({
      event: 'process.entrypoint.failed',
      component: 'process.entrypoint',
      reason_code: 'unexpected_error',
      message: error instanceof Error ? error.message : String(error),
      metadata: {error}
    })
    process.exitCode = EXIT_CODES.usage
  })
}
