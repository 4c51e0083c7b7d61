import type {CredentialRecord} from '@reality-reconciler/credential-store'
import {parseConfigDocument, readRealityIdentity} from '@reality-reconciler/proxy-config'
import type {HealthReport} from '@reality-reconciler/supervisor'

import type {ReconcilerServices} from './infrastructure.js'
import {EXIT_CODES, outcome, type CommandOutcome} from './outcome.js'

const COMPONENT = 'reconciler.steps'

/** Ports the active document listens on, falling back to the configured profiles. */
export const expectedPortsOf = ({services, content}: {services: ReconcilerServices; content?: string}) => {
  const fallback = services.config.identity.listenProfiles.map(profile => profile.port)
  if (content === undefined) {
    return fallback
  }

  const document = parseConfigDocument(content)
  const identity = document.ok ? readRealityIdentity(document.value) : undefined
  if (!identity?.ok || identity.value.listenProfiles.length === 0) {
    return fallback
  }
  return identity.value.listenProfiles.map(profile => profile.port)
}

export const restartAndVerify = async ({
  services,
  content,
  signal
}: {
  services: ReconcilerServices
  content?: string
  signal?: AbortSignal
}): Promise<HealthReport> => {
  const startedAt = Date.now()
  const report = await services.supervisor.restartAndVerify({
    timeoutSeconds: services.config.health.timeoutSeconds,
    expectedPorts: expectedPortsOf({services, content}),
    ...(signal ? {signal} : {})
  })

  services.logger.info({
    event: 'reconcile.health.checked',
    component: COMPONENT,
    duration_ms: Date.now() - startedAt,
    ...(report.status === 'unhealthy' ? {reason_code: report.classification} : {}),
    metadata: {status: report.status, attempts: report.attempts}
  })
  return report
}

/** Retention failures never change the outcome of a run. */
export const pruneRetained = async (services: ReconcilerServices) => {
  const pruned = await services.revisions.prune()
  if (!pruned.ok) {
    services.logger.warn({
      event: 'reconcile.prune.failed',
      component: COMPONENT,
      reason_code: pruned.error.code,
      message: pruned.error.message
    })
  }
}

export const syncCredentials = async ({
  services,
  active,
  previous,
  force,
  status,
  data = {}
}: {
  services: ReconcilerServices
  active: CredentialRecord
  previous?: CredentialRecord
  force: boolean
  status: string
  data?: Record<string, unknown>
}): Promise<CommandOutcome> => {
  const synced = await services.credentials.sync({active, ...(previous ? {previous} : {}), force})
  if (!synced.ok) {
    services.logger.error({
      event: 'reconcile.credentials.failed',
      component: COMPONENT,
      reason_code: synced.error.code,
      message: synced.error.message
    })
    return outcome(EXIT_CODES.operatorAttention, 'credential_sync_failed', synced.error.message, data)
  }

  if (synced.value.status === 'drift') {
    const keys = synced.value.drift.map(entry => entry.key)
    return outcome(
      EXIT_CODES.operatorAttention,
      'credential_drift',
      `credential store was edited outside the reconciler: ${keys.join(', ')}`,
      {...data, drift: synced.value.drift}
    )
  }

  return outcome(EXIT_CODES.success, status, undefined, {
    ...data,
    credentials: {
      changed: synced.value.changed,
      updatedKeys: synced.value.updatedKeys,
      ...(synced.value.backupPath ? {backupPath: synced.value.backupPath} : {})
    }
  })
}
