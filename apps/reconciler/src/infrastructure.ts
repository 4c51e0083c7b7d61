import {mkdir} from 'node:fs/promises'

import {
  createCredentialStoreSynchronizer,
  type CredentialStoreSynchronizer
} from '@reality-reconciler/credential-store'
import {createKeyMaterialGenerator, type KeyMaterialGenerator} from '@reality-reconciler/keymaterial'
import {createStructuredLogger, type StructuredLogger, type StructuredLogWriter} from '@reality-reconciler/logging'
import {createConfigValidator, type ConfigValidator} from '@reality-reconciler/proxy-config'
import {
  acquireReconcileLock,
  createRevisionManager,
  type ReconcileLock,
  type RevisionManager,
  type RevisionsResult
} from '@reality-reconciler/revisions'
import {createCommandRunner, type CommandRunner} from '@reality-reconciler/shared'
import {
  createHealthSupervisor,
  createSocketProbe,
  createSystemdServiceController,
  type HealthSupervisor
} from '@reality-reconciler/supervisor'

import type {ReconcilerConfig} from './config.js'

export const appName = 'reality-reconciler'

export type ReconcilerServices = {
  config: ReconcilerConfig
  logger: StructuredLogger
  generator: KeyMaterialGenerator
  validator: ConfigValidator
  revisions: RevisionManager
  supervisor: HealthSupervisor
  credentials: CredentialStoreSynchronizer
  acquireLock: () => Promise<RevisionsResult<ReconcileLock>>
}

export const createReconcilerLogger = ({
  config,
  writer
}: {
  config: ReconcilerConfig
  writer?: StructuredLogWriter
}): StructuredLogger =>
  createStructuredLogger({
    service: appName,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys,
    ...(writer ? {writer} : {})
  })

export const createReconcilerServices = ({
  config,
  logger,
  runner = createCommandRunner(),
  now
}: {
  config: ReconcilerConfig
  logger: StructuredLogger
  runner?: CommandRunner
  now?: () => Date
}): ReconcilerServices => {
  const timeoutMs = config.commandTimeoutMs

  return {
    config,
    logger,
    generator: createKeyMaterialGenerator({runner, binaryPath: config.paths.xrayBinary, timeoutMs}),
    validator: createConfigValidator({runner, binaryPath: config.paths.xrayBinary, timeoutMs}),
    revisions: createRevisionManager({
      activePath: config.paths.activeConfig,
      ledgerPath: config.paths.ledger,
      logger,
      ...(now ? {now} : {})
    }),
    supervisor: createHealthSupervisor({
      controller: createSystemdServiceController({
        runner,
        unit: config.service.unit,
        systemctlPath: config.service.systemctlBinary,
        journalctlPath: config.service.journalctlBinary,
        timeoutMs
      }),
      probe: createSocketProbe({runner, ssPath: config.service.ssBinary, timeoutMs}),
      logger,
      maxAttempts: config.health.maxAttempts,
      backoffMs: config.health.backoffMs
    }),
    credentials: createCredentialStoreSynchronizer({
      storePath: config.paths.credentialStore,
      logger,
      ...(now ? {now} : {})
    }),
    acquireLock: async () => {
      await mkdir(config.paths.stateDir, {recursive: true, mode: 0o700})
      return acquireReconcileLock({lockPath: config.paths.lock, acquireTimeoutMs: config.lockTimeoutMs})
    }
  }
}
