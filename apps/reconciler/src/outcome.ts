import type {ReconcilerServices} from './infrastructure.js'

export const EXIT_CODES = {
  success: 0,
  noMutation: 1,
  rolledBack: 2,
  rollbackFailed: 3,
  operatorAttention: 4,
  operationInProgress: 5,
  usage: 64
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export type CommandOutcome = {
  exitCode: ExitCode
  status: string
  detail?: string
  data?: Record<string, unknown>
}

/** Tracks whether the active config or credential store may have been touched. */
export type CommandProgress = {
  mutationStarted: boolean
}

export const createProgress = (): CommandProgress => ({mutationStarted: false})

export const outcome = (
  exitCode: ExitCode,
  status: string,
  detail?: string,
  data?: Record<string, unknown>
): CommandOutcome => ({
  exitCode,
  status,
  ...(detail !== undefined ? {detail} : {}),
  ...(data !== undefined ? {data} : {})
})

export const withReconcileLock = async ({
  services,
  run
}: {
  services: ReconcilerServices
  run: () => Promise<CommandOutcome>
}): Promise<CommandOutcome> => {
  const lock = await services.acquireLock()
  if (!lock.ok) {
    services.logger.warn({
      event: 'reconcile.lock.busy',
      component: 'reconciler.lock',
      reason_code: lock.error.code,
      message: lock.error.message
    })
    return lock.error.code === 'operation_in_progress'
      ? outcome(EXIT_CODES.operationInProgress, 'operation_in_progress', lock.error.message)
      : outcome(EXIT_CODES.noMutation, 'lock_failed', lock.error.message)
  }

  try {
    return await run()
  } finally {
    await lock.value.release()
  }
}
