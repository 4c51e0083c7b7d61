import {mkdtemp, readFile, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import type {KeyPair} from '@reality-reconciler/keymaterial'
import {ok, type CommandInvocation, type CommandRunner} from '@reality-reconciler/shared'

export const keyOf = (fill: number) => Buffer.alloc(32, fill).toString('base64url')

export const PRIOR_KEYS: KeyPair = {privateKey: keyOf(1), publicKey: keyOf(2)}
export const ROTATED_KEYS: KeyPair = {privateKey: keyOf(5), publicKey: keyOf(6)}
export const PRIOR_SHORT_IDS = ['', 'ab12cd34ef56ab78']

export const PRIOR_ROUTING_RULES = [
  {type: 'field', outboundTag: 'block', protocol: ['bittorrent']},
  {type: 'field', inboundTag: ['api'], outboundTag: 'api'}
]

/** An installed config with one Reality inbound, an API inbound and custom routing. */
export const priorConfigContent = () =>
  `${JSON.stringify(
    {
      log: {loglevel: 'warning'},
      api: {tag: 'api', services: ['StatsService']},
      stats: {},
      inbounds: [
        {
          listen: '0.0.0.0',
          port: 443,
          protocol: 'vless',
          tag: 'inbound-443',
          settings: {clients: [{id: 'client-one', flow: 'xtls-rprx-vision'}], decryption: 'none'},
          streamSettings: {
            network: 'tcp',
            security: 'reality',
            realitySettings: {
              show: false,
              dest: 'www.google.com:443',
              serverNames: ['www.google.com'],
              privateKey: PRIOR_KEYS.privateKey,
              shortIds: PRIOR_SHORT_IDS
            }
          }
        },
        {listen: '127.0.0.1', port: 10085, protocol: 'dokodemo-door', tag: 'api', settings: {address: '127.0.0.1'}}
      ],
      outbounds: [
        {protocol: 'freedom', tag: 'direct'},
        {protocol: 'blackhole', tag: 'block'}
      ],
      routing: {rules: PRIOR_ROUTING_RULES}
    },
    null,
    2
  )}\n`

export const priorStoreContent = () =>
  [
    'BOT_TOKEN=test-token',
    `XRAY_REALITY_PRIVKEY=${PRIOR_KEYS.privateKey}`,
    `XRAY_REALITY_PUBKEY=${PRIOR_KEYS.publicKey}`,
    `XRAY_REALITY_SHORT_IDS='${JSON.stringify(PRIOR_SHORT_IDS)}'`,
    ''
  ].join('\n')

type StartOutcome = 'active' | 'failed'

/**
 * In-process stand-in for the engine binary, systemctl, journalctl and ss.
 * Every field can be changed between runs.
 */
export type FakeHost = {
  runner: CommandRunner
  calls: CommandInvocation[]
  generatedKeys: KeyPair[]
  publicKeys: Map<string, string>
  serviceState: string
  startOutcome: (configContent: string) => StartOutcome
  validate: (candidateContent: string) => {exitCode: number; output: string}
  journal: string[]
  listenPorts: number[]
  foreignListeners: string[]
}

export const createFakeHost = ({configPath}: {configPath: string}): FakeHost => {
  const host: FakeHost = {
    runner: async () => ok({exitCode: 0, stdout: '', stderr: ''}),
    calls: [],
    generatedKeys: [ROTATED_KEYS],
    publicKeys: new Map([[PRIOR_KEYS.privateKey, PRIOR_KEYS.publicKey]]),
    serviceState: 'active',
    startOutcome: () => 'active',
    validate: () => ({exitCode: 0, output: 'Configuration OK.'}),
    journal: [],
    listenPorts: [443],
    foreignListeners: []
  }

  const completed = (stdout: string, exitCode = 0, stderr = '') => ok({exitCode, stdout, stderr})
  const keyOutput = (pair: KeyPair) => `PrivateKey: ${pair.privateKey}\nPassword: ${pair.publicKey}\nHash32: unused\n`

  const runXray = async (args: readonly string[]) => {
    if (args[0] === 'x25519' && args[1] === '-i' && args[2] !== undefined) {
      const publicKey = host.publicKeys.get(args[2])
      return publicKey
        ? completed(keyOutput({privateKey: args[2], publicKey}))
        : completed('', 1, 'invalid private key')
    }
    if (args[0] === 'x25519') {
      const pair = host.generatedKeys.shift()
      if (!pair) {
        return completed('', 1, 'no entropy')
      }
      host.publicKeys.set(pair.privateKey, pair.publicKey)
      return completed(keyOutput(pair))
    }
    if (args[0] === 'run' && args[1] === '-test' && args[3] !== undefined) {
      const verdict = host.validate(await readFile(args[3], 'utf8'))
      return completed(verdict.output, verdict.exitCode)
    }
    return completed('', 2, `unexpected xray arguments ${args.join(' ')}`)
  }

  const runSystemctl = async (args: readonly string[]) => {
    switch (args[0]) {
      case 'stop':
        host.serviceState = 'inactive'
        return completed('')
      case 'start': {
        host.serviceState = host.startOutcome(await readFile(configPath, 'utf8'))
        return host.serviceState === 'active'
          ? completed('')
          : completed('', 1, 'Job for xray.service failed because the control process exited with error code.')
      }
      case 'is-active':
        return completed(`${host.serviceState}\n`, host.serviceState === 'active' ? 0 : 3)
      default:
        return completed('', 2, `unexpected systemctl arguments ${args.join(' ')}`)
    }
  }

  const listeners = () => {
    const own =
      host.serviceState === 'active'
        ? host.listenPorts.map(port => `LISTEN 0 4096 *:${port} *:* users:(("xray",pid=4242,fd=3))`)
        : []
    return [...own, ...host.foreignListeners].join('\n')
  }

  host.runner = async invocation => {
    host.calls.push(invocation)
    switch (invocation.command) {
      case 'xray':
        return runXray(invocation.args)
      case 'systemctl':
        return runSystemctl(invocation.args)
      case 'journalctl':
        return completed(host.journal.join('\n'))
      case 'ss':
        return completed(listeners())
      default:
        return completed('', 127, `${invocation.command}: command not found`)
    }
  }

  return host
}

export type Workspace = {
  root: string
  configPath: string
  stateDir: string
  storePath: string
  env: NodeJS.ProcessEnv
  cleanup: () => Promise<void>
}

export const createWorkspace = async ({
  withConfig = true,
  withStore = true
}: {withConfig?: boolean; withStore?: boolean} = {}): Promise<Workspace> => {
  const root = await mkdtemp(join(tmpdir(), 'reconciler-app-'))
  const configPath = join(root, 'config.json')
  const stateDir = join(root, 'state')
  const storePath = join(root, '.env')
  if (withConfig) {
    await writeFile(configPath, priorConfigContent())
  }
  if (withStore) {
    await writeFile(storePath, priorStoreContent(), {mode: 0o600})
  }

  return {
    root,
    configPath,
    stateDir,
    storePath,
    env: {
      NODE_ENV: 'test',
      RECONCILER_LOG_LEVEL: 'silent',
      RECONCILER_XRAY_BIN: 'xray',
      RECONCILER_CONFIG_PATH: configPath,
      RECONCILER_STATE_DIR: stateDir,
      RECONCILER_CREDENTIAL_STORE_PATH: storePath,
      RECONCILER_HEALTH_TIMEOUT_SECONDS: '5',
      RECONCILER_HEALTH_BACKOFF_MS: '1',
      RECONCILER_LOCK_TIMEOUT_MS: '0'
    },
    cleanup: () => rm(root, {recursive: true, force: true})
  }
}

export const createOutput = () => {
  const chunks: string[] = []
  return {
    stdout: {
      write: (chunk: string) => {
        chunks.push(chunk)
        return true
      }
    },
    text: () => chunks.join('')
  }
}

export const createLogSink = () => {
  const lines: string[] = []
  const stream = {
    write: (chunk: string) => {
      lines.push(chunk)
      return true
    }
  }
  return {writer: {stdout: stream, stderr: stream}, lines}
}
