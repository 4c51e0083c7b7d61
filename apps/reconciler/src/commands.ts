import {readFile} from 'node:fs/promises'

import type {CredentialRecord} from '@reality-reconciler/credential-store'
import {setLogContextFields} from '@reality-reconciler/logging'
import {describeError, type ConfigRevision} from '@reality-reconciler/revisions'

import {credentialRecordFromConfig} from './credentials.js'
import type {ReconcilerServices} from './infrastructure.js'
import {EXIT_CODES, outcome, withReconcileLock, type CommandOutcome, type CommandProgress} from './outcome.js'
import {pruneRetained, restartAndVerify, syncCredentials} from './steps.js'

const COMPONENT = 'reconciler.commands'

const recordFor = async ({
  services,
  content,
  label
}: {
  services: ReconcilerServices
  content: string
  label: string
}): Promise<CredentialRecord | undefined> => {
  const record = await credentialRecordFromConfig({
    generator: services.generator,
    config: content,
    serverAddress: services.config.identity.serverAddress
  })
  if (!record.ok) {
    services.logger.warn({
      event: 'reconcile.credentials.underivable',
      component: COMPONENT,
      reason_code: record.code,
      message: `${label} config: ${record.message}`
    })
    return undefined
  }
  return record.value
}

const newestBackup = (revisions: ConfigRevision[]) =>
  revisions
    .filter(revision => revision.status === 'backup' && revision.path !== undefined)
    .sort((left, right) => right.generation - left.generation)[0]

/** Operator-requested restore of the newest backup, followed by a restart and a store sync. */
export const runRollback = ({
  services,
  progress
}: {
  services: ReconcilerServices
  progress: CommandProgress
}): Promise<CommandOutcome> =>
  withReconcileLock({
    services,
    run: async () => {
      const {logger, revisions} = services

      setLogContextFields({stage: 'load'})
      const before = await revisions.readActive()
      if (!before.ok) {
        return outcome(EXIT_CODES.noMutation, 'state_unavailable', before.error.message)
      }
      const previousRecord = before.value
        ? await recordFor({services, content: before.value.content, label: 'current'})
        : undefined

      setLogContextFields({stage: 'rollback'})
      progress.mutationStarted = true
      const restored = await revisions.rollback({reason: 'operator requested rollback'})
      if (!restored.ok) {
        if (restored.error.code === 'no_backup_available') {
          return outcome(EXIT_CODES.noMutation, 'no_backup_available', restored.error.message)
        }
        logger.fatal({
          event: 'reconcile.rollback.failed',
          component: COMPONENT,
          reason_code: restored.error.code,
          message: restored.error.message
        })
        return outcome(EXIT_CODES.rollbackFailed, 'rollback_failed', restored.error.message)
      }

      const after = await revisions.readActive()
      if (!after.ok || !after.value) {
        const message = after.ok ? 'restored config is missing' : after.error.message
        return outcome(EXIT_CODES.rollbackFailed, 'rollback_failed', message)
      }
      const restoredContent = after.value.content
      const revisionId = restored.value.revision.id
      setLogContextFields({revision_id: revisionId})

      setLogContextFields({stage: 'health'})
      const health = await restartAndVerify({services, content: restoredContent})
      if (health.status === 'unhealthy') {
        if (health.classification === 'port-conflict') {
          return outcome(EXIT_CODES.operatorAttention, 'port_conflict', health.detail, {revisionId})
        }
        logger.fatal({
          event: 'reconcile.rollback.unhealthy',
          component: COMPONENT,
          reason_code: health.classification,
          message: health.detail
        })
        return outcome(EXIT_CODES.rollbackFailed, 'rollback_unhealthy', health.detail, {revisionId})
      }

      await pruneRetained(services)

      setLogContextFields({stage: 'sync'})
      const activeRecord = await recordFor({services, content: restoredContent, label: 'restored'})
      if (!activeRecord) {
        return outcome(EXIT_CODES.operatorAttention, 'credential_sync_failed', 'restored config has no usable identity', {
          revisionId
        })
      }
      return syncCredentials({
        services,
        active: activeRecord,
        ...(previousRecord ? {previous: previousRecord} : {}),
        force: false,
        status: 'rolled_back',
        data: {revisionId, generation: restored.value.revision.generation}
      })
    }
  })

/** Re-syncs the credential store from the active config without touching the service. */
export const runSync = ({
  services,
  force,
  progress
}: {
  services: ReconcilerServices
  force: boolean
  progress: CommandProgress
}): Promise<CommandOutcome> =>
  withReconcileLock({
    services,
    run: async () => {
      const {revisions} = services

      setLogContextFields({stage: 'load'})
      const active = await revisions.readActive()
      if (!active.ok) {
        return outcome(EXIT_CODES.noMutation, 'state_unavailable', active.error.message)
      }
      if (!active.value) {
        return outcome(EXIT_CODES.noMutation, 'no_active_config', 'there is no active config to sync from')
      }

      const activeRecord = await credentialRecordFromConfig({
        generator: services.generator,
        config: active.value.content,
        serverAddress: services.config.identity.serverAddress
      })
      if (!activeRecord.ok) {
        return outcome(EXIT_CODES.noMutation, 'generation_failed', activeRecord.message, {code: activeRecord.code})
      }

      const report = await revisions.report()
      const backup = report.ok ? newestBackup(report.value.revisions) : undefined
      let previousRecord: CredentialRecord | undefined
      if (backup?.path) {
        try {
          previousRecord = await recordFor({services, content: await readFile(backup.path, 'utf8'), label: 'backup'})
        } catch (error) {
          services.logger.warn({
            event: 'reconcile.backup.unreadable',
            component: COMPONENT,
            revision_id: backup.id,
            message: describeError(error)
          })
        }
      }

      setLogContextFields({stage: 'sync'})
      progress.mutationStarted = true
      return syncCredentials({
        services,
        active: activeRecord.value,
        ...(previousRecord ? {previous: previousRecord} : {}),
        force,
        status: 'synced',
        data: {revisionId: active.value.revision.id}
      })
    }
  })

/** Ledger, snapshots and credential store state, as one JSON-friendly object. */
export const runStatus = ({services}: {services: ReconcilerServices}): Promise<CommandOutcome> =>
  withReconcileLock({
    services,
    run: async () => {
      const active = await services.revisions.readActive()
      if (!active.ok) {
        return outcome(EXIT_CODES.noMutation, 'state_unavailable', active.error.message)
      }
      const report = await services.revisions.report()
      if (!report.ok) {
        return outcome(EXIT_CODES.noMutation, 'state_unavailable', report.error.message)
      }

      let credentials: Record<string, unknown> = {checked: false}
      if (active.value) {
        const record = await recordFor({services, content: active.value.content, label: 'active'})
        if (record) {
          const inspection = await services.credentials.inspect({active: record})
          credentials = inspection.ok
            ? {checked: true, ...inspection.value}
            : {checked: false, error: inspection.error.message}
        }
      }

      const drifted = credentials.checked === true && credentials.inSync === false
      return outcome(drifted ? EXIT_CODES.operatorAttention : EXIT_CODES.success, 'status', undefined, {
        state: report.value.state,
        activePath: report.value.activePath,
        active: active.value?.revision ?? null,
        revisions: report.value.revisions,
        snapshots: report.value.snapshots,
        credentials
      })
    }
  })
