import {randomUUID} from 'node:crypto'
import {parseArgs} from 'node:util'

import {createStructuredLogger, runWithLogContext, type StructuredLogWriter} from '@reality-reconciler/logging'
import type {CommandRunner} from '@reality-reconciler/shared'

import {runRollback, runStatus, runSync} from './commands.js'
import {loadConfig, type ReconcilerConfig} from './config.js'
import {appName, createReconcilerLogger, createReconcilerServices} from './infrastructure.js'
import {createProgress, EXIT_CODES, outcome, type CommandOutcome, type ExitCode} from './outcome.js'
import {runReconcile} from './reconcile.js'

export const USAGE = `usage: ${appName} <command> [options]

commands:
  reconcile [--keep-private-key] [--keep-short-ids] [--force-sync]
  rollback
  sync [--force]
  status
`

const COMMAND_FLAGS = {
  reconcile: ['keep-private-key', 'keep-short-ids', 'force-sync'],
  rollback: [],
  sync: ['force'],
  status: []
} as const satisfies Record<string, readonly string[]>

type CommandName = keyof typeof COMMAND_FLAGS

const isCommandName = (value: string | undefined): value is CommandName =>
  value !== undefined && Object.hasOwn(COMMAND_FLAGS, value)

export type ParsedCommand =
  | {command: 'reconcile'; keepPrivateKey: boolean; keepShortIds: boolean; forceSync: boolean}
  | {command: 'rollback'}
  | {command: 'sync'; force: boolean}
  | {command: 'status'}

export type ParseResult = {ok: true; value: ParsedCommand} | {ok: false; message: string}

export const parseCommand = (argv: string[]): ParseResult => {
  let parsed: ReturnType<typeof parseFlags>
  try {
    parsed = parseFlags(argv)
  } catch (error) {
    return {ok: false, message: error instanceof Error ? error.message : String(error)}
  }

  const [command, ...extra] = parsed.positionals
  if (!isCommandName(command)) {
    return {ok: false, message: command === undefined ? 'a command is required' : `unknown command "${command}"`}
  }
  if (extra.length > 0) {
    return {ok: false, message: `unexpected argument "${extra[0]}"`}
  }

  const allowed: readonly string[] = COMMAND_FLAGS[command]
  const given = Object.entries(parsed.values)
    .filter(([, value]) => value === true)
    .map(([name]) => name)
  const rejected = given.find(name => !allowed.includes(name))
  if (rejected) {
    return {ok: false, message: `--${rejected} is not an option of ${command}`}
  }

  const flag = (name: string) => given.includes(name)
  switch (command) {
    case 'reconcile':
      return {
        ok: true,
        value: {
          command,
          keepPrivateKey: flag('keep-private-key'),
          keepShortIds: flag('keep-short-ids'),
          forceSync: flag('force-sync')
        }
      }
    case 'sync':
      return {ok: true, value: {command, force: flag('force')}}
    case 'rollback':
    case 'status':
      return {ok: true, value: {command}}
  }
}

const parseFlags = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'keep-private-key': {type: 'boolean'},
      'keep-short-ids': {type: 'boolean'},
      'force-sync': {type: 'boolean'},
      force: {type: 'boolean'}
    }
  })

export type CliOptions = {
  argv: string[]
  env: NodeJS.ProcessEnv
  stdout: {write: (chunk: string) => unknown}
  logWriter?: StructuredLogWriter
  runner?: CommandRunner
  now?: () => Date
  signal?: AbortSignal
}

const startupEnv = (env: NodeJS.ProcessEnv) =>
  env.NODE_ENV === 'production' || env.NODE_ENV === 'test' || env.NODE_ENV === 'development' ? env.NODE_ENV : 'production'

const printOutcome = (stdout: CliOptions['stdout'], result: CommandOutcome) => {
  stdout.write(`${JSON.stringify(result, null, 2)}\n`)
}

export const runCli = async ({argv, env, stdout, logWriter, runner, now, signal}: CliOptions): Promise<ExitCode> => {
  const parsed = parseCommand(argv)
  if (!parsed.ok) {
    stdout.write(`${parsed.message}\n\n${USAGE}`)
    return EXIT_CODES.usage
  }

  let config: ReconcilerConfig
  try {
    config = loadConfig(env)
  } catch (error) {
    createStructuredLogger({
      service: appName,
      env: startupEnv(env),
      level: 'error',
      ...(logWriter ? {writer: logWriter} : {})
    }).fatal({
      event: 'process.config.invalid',
      component: 'process.entrypoint',
      reason_code: 'invalid_configuration',
      message: error instanceof Error ? error.message : String(error)
    })
    printOutcome(stdout, outcome(EXIT_CODES.usage, 'invalid_configuration'))
    return EXIT_CODES.usage
  }

  const logger = createReconcilerLogger({config, ...(logWriter ? {writer: logWriter} : {})})
  const services = createReconcilerServices({config, logger, ...(runner ? {runner} : {}), ...(now ? {now} : {})})
  const progress = createProgress()
  const command = parsed.value

  return runWithLogContext({correlation_id: randomUUID(), run_id: randomUUID(), command: command.command}, async () => {
    const startedAt = Date.now()
    let result: CommandOutcome
    try {
      switch (command.command) {
        case 'reconcile':
          result = await runReconcile({
            services,
            flags: {
              keepPrivateKey: command.keepPrivateKey,
              keepShortIds: command.keepShortIds,
              forceSync: command.forceSync
            },
            progress,
            ...(signal ? {signal} : {})
          })
          break
        case 'rollback':
          result = await runRollback({services, progress})
          break
        case 'sync':
          result = await runSync({services, force: command.force, progress})
          break
        case 'status':
          result = await runStatus({services})
          break
      }
    } catch (error) {
      const exitCode = progress.mutationStarted ? EXIT_CODES.rollbackFailed : EXIT_CODES.usage
      logger.fatal({
        event: 'process.command.crashed',
        component: 'process.entrypoint',
        reason_code: 'unexpected_error',
        message: error instanceof Error ? error.message : String(error),
        metadata: {mutationStarted: progress.mutationStarted, error}
      })
      result = outcome(exitCode, 'unexpected_error')
    }

    logger.info({
      event: 'process.command.finished',
      component: 'process.entrypoint',
      duration_ms: Date.now() - startedAt,
      ...(result.exitCode !== EXIT_CODES.success ? {reason_code: result.status} : {}),
      metadata: {exitCode: result.exitCode, status: result.status}
    })
    printOutcome(stdout, result)
    return result.exitCode
  })
}
