import type {CredentialRecord} from '@reality-reconciler/credential-store'
import type {KeyMaterialGenerator, KeyMaterialResult, KeyPair, ShortIdSet} from '@reality-reconciler/keymaterial'
import {setLogContextFields} from '@reality-reconciler/logging'
import {
  checksumContent,
  parseConfigDocument,
  readRealityIdentity,
  serializeConfig,
  synthesize,
  type ProxyConfig,
  type RealityIdentity
} from '@reality-reconciler/proxy-config'
import {requiresRollback, type Unhealthy} from '@reality-reconciler/supervisor'

import {withServerAddress} from './credentials.js'
import type {ReconcilerServices} from './infrastructure.js'
import {EXIT_CODES, outcome, withReconcileLock, type CommandOutcome, type CommandProgress} from './outcome.js'
import {pruneRetained, restartAndVerify, syncCredentials} from './steps.js'

const COMPONENT = 'reconciler.reconcile'

export type ReconcileFlags = {
  keepPrivateKey: boolean
  keepShortIds: boolean
  forceSync: boolean
}

type ReconcileInput = {
  services: ReconcilerServices
  flags: ReconcileFlags
  progress: CommandProgress
  signal?: AbortSignal
}

export const freshShortIds = ({generator, wildcard}: {generator: KeyMaterialGenerator; wildcard: boolean}): ShortIdSet =>
  wildcard ? ['', generator.deriveShortId()] : [generator.deriveShortId()]

const resolveKeyPair = async ({
  generator,
  keepPrivateKey,
  priorIdentity
}: {
  generator: KeyMaterialGenerator
  keepPrivateKey: boolean
  priorIdentity: RealityIdentity | undefined
}): Promise<KeyMaterialResult<KeyPair>> => {
  if (!keepPrivateKey || !priorIdentity) {
    return generator.generate()
  }

  const publicKey = await generator.derivePublicKey(priorIdentity.privateKey)
  return publicKey.ok ? {ok: true, value: {privateKey: priorIdentity.privateKey, publicKey: publicKey.value}} : publicKey
}

/** Credentials the store may still hold from before this run; drift is measured against them too. */
const previousCredentials = async ({
  services,
  priorIdentity,
  keyPair
}: {
  services: ReconcilerServices
  priorIdentity: RealityIdentity
  keyPair: KeyPair
}): Promise<CredentialRecord | undefined> => {
  const serverAddress = services.config.identity.serverAddress
  if (priorIdentity.privateKey === keyPair.privateKey) {
    return withServerAddress({...keyPair, shortIds: priorIdentity.shortIds}, serverAddress)
  }

  const derived = await services.generator.derivePublicKey(priorIdentity.privateKey)
  let publicKey = derived.ok ? derived.value : undefined
  if (!derived.ok) {
    // The store written for the prior config still pairs its private key with the public one.
    const stored = await services.credentials.storedPublicKey({privateKey: priorIdentity.privateKey})
    publicKey = stored.ok ? stored.value : undefined
    services.logger.warn({
      event: 'reconcile.previous_credentials.underivable',
      component: COMPONENT,
      reason_code: derived.error.code,
      message: derived.error.message,
      metadata: {fromStore: publicKey !== undefined}
    })
  }
  if (publicKey === undefined) {
    return undefined
  }
  return withServerAddress(
    {privateKey: priorIdentity.privateKey, publicKey, shortIds: priorIdentity.shortIds},
    serverAddress
  )
}

const rollBackUnhealthy = async ({
  services,
  health,
  revisionId
}: {
  services: ReconcilerServices
  health: Unhealthy
  revisionId: string
}): Promise<CommandOutcome> => {
  const {logger, revisions} = services
  setLogContextFields({stage: 'rollback'})
  logger.error({
    event: 'reconcile.health.failed',
    component: COMPONENT,
    reason_code: health.classification,
    message: health.detail,
    metadata: {attempts: health.attempts, lastLogLines: health.lastLogLines}
  })

  const restored = await revisions.rollback({reason: `${health.classification}: ${health.detail}`})
  if (!restored.ok) {
    logger.fatal({
      event: 'reconcile.rollback.failed',
      component: COMPONENT,
      reason_code: restored.error.code,
      message: restored.error.message
    })
    return outcome(EXIT_CODES.rollbackFailed, 'rollback_failed', restored.error.message, {
      revisionId,
      classification: health.classification
    })
  }

  const active = await revisions.readActive()
  const recheck = await restartAndVerify({
    services,
    ...(active.ok && active.value ? {content: active.value.content} : {})
  })
  if (recheck.status === 'unhealthy') {
    logger.fatal({
      event: 'reconcile.rollback.unhealthy',
      component: COMPONENT,
      reason_code: recheck.classification,
      message: recheck.detail,
      metadata: {lastLogLines: recheck.lastLogLines}
    })
    return outcome(EXIT_CODES.rollbackFailed, 'rollback_unhealthy', recheck.detail, {
      revisionId,
      restoredRevisionId: restored.value.revision.id,
      classification: health.classification,
      rollbackClassification: recheck.classification
    })
  }

  await pruneRetained(services)
  return outcome(EXIT_CODES.rolledBack, 'rolled_back', health.detail, {
    revisionId,
    restoredRevisionId: restored.value.revision.id,
    classification: health.classification,
    lastLogLines: health.lastLogLines
  })
}

const reconcile = async ({services, flags, progress, signal}: ReconcileInput): Promise<CommandOutcome> => {
  const {config, logger, generator, validator, revisions} = services

  setLogContextFields({stage: 'load'})
  const active = await revisions.readActive()
  if (!active.ok) {
    return outcome(EXIT_CODES.noMutation, 'state_unavailable', active.error.message)
  }

  let prior: ProxyConfig | undefined
  let priorIdentity: RealityIdentity | undefined
  if (active.value) {
    const parsed = parseConfigDocument(active.value.content)
    if (!parsed.ok) {
      return outcome(EXIT_CODES.noMutation, 'active_config_unreadable', parsed.error.message)
    }
    prior = parsed.value
    const identity = readRealityIdentity(parsed.value)
    if (identity.ok) {
      priorIdentity = identity.value
    }
  }

  setLogContextFields({stage: 'generate'})
  const keyPair = await resolveKeyPair({generator, keepPrivateKey: flags.keepPrivateKey, priorIdentity})
  if (!keyPair.ok) {
    logger.error({
      event: 'reconcile.generation.failed',
      component: COMPONENT,
      reason_code: keyPair.error.code,
      message: keyPair.error.message
    })
    return outcome(EXIT_CODES.noMutation, 'generation_failed', keyPair.error.message, {code: keyPair.error.code})
  }
  const shortIds =
    flags.keepShortIds && priorIdentity
      ? priorIdentity.shortIds
      : freshShortIds({generator, wildcard: config.identity.wildcardShortId})
  const activeRecord = withServerAddress({...keyPair.value, shortIds}, config.identity.serverAddress)
  const previousRecord = priorIdentity
    ? await previousCredentials({services, priorIdentity, keyPair: keyPair.value})
    : undefined

  setLogContextFields({stage: 'synthesize'})
  const candidate = synthesize({
    ...(prior ? {prior} : {}),
    keyPair: keyPair.value,
    shortIds,
    destination: config.identity.destination,
    serverNames: config.identity.serverNames,
    listenProfiles: config.identity.listenProfiles
  })
  if (!candidate.ok) {
    return outcome(EXIT_CODES.noMutation, 'synthesis_failed', candidate.error.message)
  }
  const content = serializeConfig(candidate.value)

  if (active.value && checksumContent(active.value.content) === checksumContent(content)) {
    logger.info({
      event: 'reconcile.unchanged',
      component: COMPONENT,
      revision_id: active.value.revision.id
    })
    setLogContextFields({stage: 'sync'})
    return syncCredentials({
      services,
      active: activeRecord,
      ...(previousRecord ? {previous: previousRecord} : {}),
      force: flags.forceSync,
      status: 'unchanged',
      data: {revisionId: active.value.revision.id}
    })
  }

  setLogContextFields({stage: 'validate'})
  const draft = await revisions.registerCandidate({content})
  if (!draft.ok) {
    return outcome(EXIT_CODES.noMutation, 'ledger_failed', draft.error.message)
  }
  const revisionId = draft.value.id
  setLogContextFields({revision_id: revisionId})

  const validated = await validator.validate(candidate.value)
  if (!validated.ok) {
    const phase = validated.error.phase ?? 'structural'
    const discarded = await revisions.discard({id: revisionId, reason: `${phase} validation: ${validated.error.message}`})
    if (!discarded.ok) {
      logger.warn({
        event: 'reconcile.discard.failed',
        component: COMPONENT,
        reason_code: discarded.error.code,
        message: discarded.error.message
      })
    }
    logger.error({
      event: 'reconcile.validation.failed',
      component: COMPONENT,
      reason_code: validated.error.code,
      message: validated.error.message,
      metadata: {phase, detail: validated.error.detail ?? null}
    })
    return outcome(EXIT_CODES.noMutation, 'validation_failed', validated.error.message, {
      revisionId,
      phase,
      ...(validated.error.detail ? {diagnostics: validated.error.detail} : {})
    })
  }

  const promoted = await revisions.markValidated(revisionId)
  if (!promoted.ok) {
    return outcome(EXIT_CODES.noMutation, 'ledger_failed', promoted.error.message)
  }

  setLogContextFields({stage: 'apply'})
  progress.mutationStarted = true
  const applied = await revisions.apply({revisionId, content: validated.value.content})
  if (!applied.ok) {
    const rollback = applied.error.rollback
    logger.error({
      event: 'reconcile.apply.failed',
      component: COMPONENT,
      reason_code: applied.error.code,
      message: applied.error.message,
      metadata: {rollback: rollback ?? null}
    })
    if (!rollback) {
      return outcome(EXIT_CODES.noMutation, 'apply_failed', applied.error.message, {revisionId})
    }
    return rollback.restored
      ? outcome(EXIT_CODES.rolledBack, 'rolled_back', applied.error.message, {revisionId, code: applied.error.code})
      : outcome(EXIT_CODES.rollbackFailed, 'rollback_failed', rollback.message, {revisionId, code: rollback.code})
  }

  setLogContextFields({stage: 'health'})
  const health = await restartAndVerify({services, content: validated.value.content, ...(signal ? {signal} : {})})
  if (health.status === 'unhealthy') {
    if (!requiresRollback(health)) {
      logger.error({
        event: 'reconcile.port_conflict',
        component: COMPONENT,
        reason_code: health.classification,
        message: health.detail,
        metadata: {lastLogLines: health.lastLogLines}
      })
      return outcome(EXIT_CODES.operatorAttention, 'port_conflict', health.detail, {
        revisionId,
        lastLogLines: health.lastLogLines
      })
    }
    return rollBackUnhealthy({services, health, revisionId})
  }

  setLogContextFields({stage: 'prune'})
  await pruneRetained(services)

  setLogContextFields({stage: 'sync'})
  return syncCredentials({
    services,
    active: activeRecord,
    ...(previousRecord ? {previous: previousRecord} : {}),
    force: flags.forceSync,
    status: 'reconciled',
    data: {
      revisionId,
      generation: applied.value.revision.generation,
      ...(applied.value.backupPath ? {backupPath: applied.value.backupPath} : {}),
      listeningPorts: health.listeningPorts
    }
  })
}

export const runReconcile = (input: ReconcileInput): Promise<CommandOutcome> =>
  withReconcileLock({services: input.services, run: () => reconcile(input)})
