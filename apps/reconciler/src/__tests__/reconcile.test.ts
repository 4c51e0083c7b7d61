import {readFile, writeFile, mkdir, stat} from 'node:fs/promises'
import {join} from 'node:path'

import {parseEnvContent} from '@reality-reconciler/credential-store'
import {checksumContent, parseConfigDocument, readRealityIdentity} from '@reality-reconciler/proxy-config'
import {listSnapshots, loadLedger} from '@reality-reconciler/revisions'
import {afterEach, beforeEach, describe, expect, it} from 'vitest'

import {EXIT_CODES, runCli} from '../index.js'
import {
  createFakeHost,
  createLogSink,
  createOutput,
  createWorkspace,
  keyOf,
  PRIOR_KEYS,
  PRIOR_ROUTING_RULES,
  PRIOR_SHORT_IDS,
  priorConfigContent,
  priorStoreContent,
  ROTATED_KEYS,
  type FakeHost,
  type Workspace
} from './fixtures.js'

const readIdentity = async (path: string) => {
  const document = parseConfigDocument(await readFile(path, 'utf8'))
  if (!document.ok) {
    throw new Error(document.error.message)
  }
  const identity = readRealityIdentity(document.value)
  if (!identity.ok) {
    throw new Error(identity.error.message)
  }
  return {document: document.value, identity: identity.value}
}

const readLedger = async (workspace: Workspace) => {
  const ledger = await loadLedger(join(workspace.stateDir, 'revisions.json'))
  if (!ledger.ok || !ledger.value) {
    throw new Error('ledger is missing')
  }
  return ledger.value
}

const backupsOf = async (path: string) => (await listSnapshots(path)).filter(snapshot => snapshot.kind === 'backup')

describe('reconcile command', () => {
  let workspace: Workspace
  let host: FakeHost

  const run = async (argv: string[], env: NodeJS.ProcessEnv = workspace.env) => {
    const output = createOutput()
    const logs = createLogSink()
    const exitCode = await runCli({argv, env, stdout: output.stdout, logWriter: logs.writer, runner: host.runner})
    return {exitCode, text: output.text(), logs: logs.lines}
  }

  const runJson = async (argv: string[]) => {
    const result = await run(argv)
    const parsed: unknown = JSON.parse(result.text)
    return {...result, outcome: parsed}
  }

  beforeEach(async () => {
    workspace = await createWorkspace()
    host = createFakeHost({configPath: workspace.configPath})
  })

  afterEach(async () => {
    await workspace.cleanup()
  })

  it('rotates keys and short ids, keeps unmanaged sections and syncs the store', async () => {
    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.success)
    expect(outcome).toMatchObject({exitCode: 0, status: 'reconciled', data: {revisionId: 'rev-0001', generation: 1}})

    const {document, identity} = await readIdentity(workspace.configPath)
    expect(identity.privateKey).toBe(ROTATED_KEYS.privateKey)
    expect(identity.shortIds).toHaveLength(2)
    expect(identity.shortIds[0]).toBe('')
    expect(identity.shortIds[1]).toMatch(/^[0-9a-f]{16}$/u)
    expect(document.routing).toEqual({rules: PRIOR_ROUTING_RULES})

    const backups = await backupsOf(workspace.configPath)
    expect(backups).toHaveLength(1)
    expect(await readFile(backups[0]?.path ?? '', 'utf8')).toBe(priorConfigContent())

    const stored = parseEnvContent(await readFile(workspace.storePath, 'utf8'))
    expect(stored).toEqual({
      BOT_TOKEN: 'test-token',
      XRAY_REALITY_PRIVKEY: ROTATED_KEYS.privateKey,
      XRAY_REALITY_PUBKEY: ROTATED_KEYS.publicKey,
      XRAY_REALITY_SHORT_IDS: JSON.stringify(identity.shortIds)
    })

    const ledger = await readLedger(workspace)
    expect(ledger.revisions.map(revision => [revision.id, revision.status])).toEqual([
      ['rev-0000', 'backup'],
      ['rev-0001', 'active']
    ])
  })

  it('measures drift against the stored public key when the prior key cannot be derived', async () => {
    host.publicKeys.delete(PRIOR_KEYS.privateKey)

    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.success)
    expect(outcome).toMatchObject({status: 'reconciled', data: {revisionId: 'rev-0001'}})
    const stored = parseEnvContent(await readFile(workspace.storePath, 'utf8'))
    expect(stored.XRAY_REALITY_PUBKEY).toBe(ROTATED_KEYS.publicKey)
  })

  it('aborts before any mutation when the engine rejects the candidate', async () => {
    host.validate = () => ({exitCode: 23, output: 'Failed to build REALITY config: invalid privateKey'})
    const before = checksumContent(await readFile(workspace.configPath))

    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.noMutation)
    expect(outcome).toEqual({
      exitCode: 1,
      status: 'validation_failed',
      detail: 'engine rejected the candidate with status 23',
      data: {
        revisionId: 'rev-0001',
        phase: 'semantic',
        diagnostics: 'Failed to build REALITY config: invalid privateKey'
      }
    })
    expect(checksumContent(await readFile(workspace.configPath))).toBe(before)
    expect(await backupsOf(workspace.configPath)).toEqual([])
    expect(await readFile(workspace.storePath, 'utf8')).toBe(priorStoreContent())
    expect(host.calls.some(call => call.command === 'systemctl')).toBe(false)

    const ledger = await readLedger(workspace)
    expect(ledger.revisions.find(revision => revision.id === 'rev-0001')).toMatchObject({
      status: 'discarded',
      reason: 'semantic validation: engine rejected the candidate with status 23'
    })
  })

  it('rolls back when the service rejects the new config at startup', async () => {
    host.startOutcome = content => (content.includes(ROTATED_KEYS.privateKey) ? 'failed' : 'active')
    host.journal = ['xray[4242]: Failed to start: failed to load REALITY private key']

    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.rolledBack)
    expect(outcome).toMatchObject({
      status: 'rolled_back',
      detail: 'service entered the failed state after start',
      data: {revisionId: 'rev-0001', restoredRevisionId: 'rev-0000', classification: 'config-rejected-at-startup'}
    })
    expect(await readFile(workspace.configPath, 'utf8')).toBe(priorConfigContent())
    expect(host.serviceState).toBe('active')
    expect(await readFile(workspace.storePath, 'utf8')).toBe(priorStoreContent())

    const ledger = await readLedger(workspace)
    expect(ledger.revisions.find(revision => revision.id === 'rev-0000')?.status).toBe('active')
    const failed = ledger.revisions.find(revision => revision.id === 'rev-0001')
    expect(failed).toMatchObject({
      status: 'discarded',
      reason: 'config-rejected-at-startup: service entered the failed state after start'
    })
    expect(failed?.path).toMatch(/config\.json\.discarded\.\d{15}$/)
    expect(await readFile(failed?.path ?? '', 'utf8')).toContain(ROTATED_KEYS.privateKey)
    expect((await listSnapshots(workspace.configPath)).map(snapshot => snapshot.kind)).toEqual(['backup', 'discarded'])
  })

  it('leaves the candidate active and asks for the operator on a port conflict', async () => {
    host.startOutcome = content => (content.includes(ROTATED_KEYS.privateKey) ? 'failed' : 'active')
    host.journal = ['xray[4242]: Failed to start: listen tcp 0.0.0.0:443: bind: address already in use']

    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.operatorAttention)
    expect(outcome).toMatchObject({
      status: 'port_conflict',
      detail: 'xray[4242]: Failed to start: listen tcp 0.0.0.0:443: bind: address already in use'
    })
    expect((await readIdentity(workspace.configPath)).identity.privateKey).toBe(ROTATED_KEYS.privateKey)
    expect(await readFile(workspace.storePath, 'utf8')).toBe(priorStoreContent())
    expect((await readLedger(workspace)).revisions.find(revision => revision.id === 'rev-0001')?.status).toBe('active')
  })

  it('reports a foreign listener on a managed port without rolling back', async () => {
    host.foreignListeners = ['LISTEN 0 511 0.0.0.0:443 0.0.0.0:* users:(("nginx",pid=880,fd=6))']

    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.operatorAttention)
    expect(outcome).toMatchObject({status: 'port_conflict', detail: 'port 443 is held by nginx (pid 880)'})
    expect(await backupsOf(workspace.configPath)).toHaveLength(1)
  })

  it('fails fast while another reconcile holds the lock', async () => {
    await mkdir(workspace.stateDir, {recursive: true})
    await writeFile(
      join(workspace.stateDir, 'reconcile.lock'),
      `${JSON.stringify({pid: process.pid, acquiredAt: '2026-01-01T00:00:00.000Z'})}\n`
    )

    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.operationInProgress)
    expect(outcome).toMatchObject({status: 'operation_in_progress'})
    expect(host.calls).toEqual([])
    expect(await readFile(workspace.configPath, 'utf8')).toBe(priorConfigContent())
  })

  it('exits with 1 when no key material can be generated', async () => {
    host.generatedKeys = []

    const {exitCode, outcome} = await runJson(['reconcile'])

    expect(exitCode).toBe(EXIT_CODES.noMutation)
    expect(outcome).toMatchObject({status: 'generation_failed', data: {code: 'generator_failed'}})
    expect(await backupsOf(workspace.configPath)).toEqual([])
  })

  it('reports drift in the credential store unless the sync is forced', async () => {
    const edited = priorStoreContent().replace(PRIOR_KEYS.publicKey, keyOf(9))
    await writeFile(workspace.storePath, edited)

    const drifted = await runJson(['reconcile'])
    expect(drifted.exitCode).toBe(EXIT_CODES.operatorAttention)
    expect(drifted.outcome).toMatchObject({
      status: 'credential_drift',
      detail: 'credential store was edited outside the reconciler: XRAY_REALITY_PUBKEY'
    })
    expect(await readFile(workspace.storePath, 'utf8')).toBe(edited)

    const forced = await run(['sync', '--force'])
    expect(forced.exitCode).toBe(EXIT_CODES.success)
    const stored = parseEnvContent(await readFile(workspace.storePath, 'utf8'))
    expect(stored.XRAY_REALITY_PUBKEY).toBe(ROTATED_KEYS.publicKey)
  })

  it('writes a fresh config and store on first install', async () => {
    const fresh = await createWorkspace({withConfig: false, withStore: false})
    try {
      host = createFakeHost({configPath: fresh.configPath})
      const {exitCode} = await run(['reconcile'], {...fresh.env, RECONCILER_SERVER_ADDRESS: '203.0.113.7'})

      expect(exitCode).toBe(EXIT_CODES.success)
      const {identity} = await readIdentity(fresh.configPath)
      expect(identity.privateKey).toBe(ROTATED_KEYS.privateKey)
      expect(identity.listenProfiles).toEqual([{port: 443, isPrimary: true, listen: '::'}])
      expect(await backupsOf(fresh.configPath)).toEqual([])

      const stored = parseEnvContent(await readFile(fresh.storePath, 'utf8'))
      expect(stored.SERVER_IP).toBe('203.0.113.7')
      expect(stored.XRAY_REALITY_PRIVKEY).toBe(ROTATED_KEYS.privateKey)
      expect((await stat(fresh.storePath)).mode & 0o777).toBe(0o600)
    } finally {
      await fresh.cleanup()
    }
  })

  it('leaves a converged host untouched when identity is kept', async () => {
    expect((await run(['reconcile'])).exitCode).toBe(EXIT_CODES.success)
    const converged = await readFile(workspace.configPath, 'utf8')
    host.calls = []

    const {exitCode, outcome} = await runJson(['reconcile', '--keep-private-key', '--keep-short-ids'])

    expect(exitCode).toBe(EXIT_CODES.success)
    expect(outcome).toMatchObject({status: 'unchanged', data: {revisionId: 'rev-0001', credentials: {changed: false}}})
    expect(await readFile(workspace.configPath, 'utf8')).toBe(converged)
    expect(host.calls.some(call => call.command === 'systemctl')).toBe(false)
  })

  it('keeps the installed short ids when asked to', async () => {
    const {exitCode} = await run(['reconcile', '--keep-short-ids'])

    expect(exitCode).toBe(EXIT_CODES.success)
    expect((await readIdentity(workspace.configPath)).identity.shortIds).toEqual(PRIOR_SHORT_IDS)
  })
})

describe('rollback, sync and status commands', () => {
  let workspace: Workspace
  let host: FakeHost

  const run = async (argv: string[]) => {
    const output = createOutput()
    const exitCode = await runCli({
      argv,
      env: workspace.env,
      stdout: output.stdout,
      logWriter: createLogSink().writer,
      runner: host.runner
    })
    const outcome: unknown = JSON.parse(output.text())
    return {exitCode, outcome}
  }

  beforeEach(async () => {
    workspace = await createWorkspace()
    host = createFakeHost({configPath: workspace.configPath})
  })

  afterEach(async () => {
    await workspace.cleanup()
  })

  it('restores the previous config and its credentials on request', async () => {
    expect((await run(['reconcile'])).exitCode).toBe(EXIT_CODES.success)

    const {exitCode, outcome} = await run(['rollback'])

    expect(exitCode).toBe(EXIT_CODES.success)
    expect(outcome).toMatchObject({status: 'rolled_back', data: {revisionId: 'rev-0000', generation: 0}})
    expect(await readFile(workspace.configPath, 'utf8')).toBe(priorConfigContent())
    expect(parseEnvContent(await readFile(workspace.storePath, 'utf8'))).toEqual({
      BOT_TOKEN: 'test-token',
      XRAY_REALITY_PRIVKEY: PRIOR_KEYS.privateKey,
      XRAY_REALITY_PUBKEY: PRIOR_KEYS.publicKey,
      XRAY_REALITY_SHORT_IDS: JSON.stringify(PRIOR_SHORT_IDS)
    })
  })

  it('refuses a rollback when there is no backup', async () => {
    const {exitCode, outcome} = await run(['rollback'])

    expect(exitCode).toBe(EXIT_CODES.noMutation)
    expect(outcome).toEqual({
      exitCode: 1,
      status: 'no_backup_available',
      detail: 'there is no backup revision to restore'
    })
  })

  it('re-syncs a store that is missing managed keys', async () => {
    await writeFile(workspace.storePath, 'BOT_TOKEN=test-token\n')

    const {exitCode, outcome} = await run(['sync'])

    expect(exitCode).toBe(EXIT_CODES.success)
    expect(outcome).toMatchObject({status: 'synced', data: {revisionId: 'rev-0000', credentials: {changed: true}}})
    expect(parseEnvContent(await readFile(workspace.storePath, 'utf8'))).toEqual({
      BOT_TOKEN: 'test-token',
      XRAY_REALITY_PRIVKEY: PRIOR_KEYS.privateKey,
      XRAY_REALITY_PUBKEY: PRIOR_KEYS.publicKey,
      XRAY_REALITY_SHORT_IDS: JSON.stringify(PRIOR_SHORT_IDS)
    })
  })

  it('prints the ledger, snapshots and store state', async () => {
    expect((await run(['reconcile'])).exitCode).toBe(EXIT_CODES.success)

    const {exitCode, outcome} = await run(['status'])

    expect(exitCode).toBe(EXIT_CODES.success)
    expect(outcome).toMatchObject({
      status: 'status',
      data: {
        state: 'active',
        activePath: workspace.configPath,
        active: {id: 'rev-0001', status: 'active'},
        credentials: {checked: true, present: true, inSync: true, drift: []}
      }
    })
  })
})

describe('command line', () => {
  const run = async (argv: string[], env: NodeJS.ProcessEnv = {NODE_ENV: 'test'}) => {
    const output = createOutput()
    const exitCode = await runCli({argv, env, stdout: output.stdout, logWriter: createLogSink().writer})
    return {exitCode, text: output.text()}
  }

  it.each([
    [[], 'a command is required'],
    [['deploy'], 'unknown command "deploy"'],
    [['sync', '--keep-short-ids'], '--keep-short-ids is not an option of sync'],
    [['status', 'now'], 'unexpected argument "now"']
  ])('rejects %j with a usage error', async (argv, message) => {
    const {exitCode, text} = await run(argv)

    expect(exitCode).toBe(EXIT_CODES.usage)
    expect(text.startsWith(`${message}\n`)).toBe(true)
  })

  it('rejects unknown flags', async () => {
    expect((await run(['reconcile', '--bogus'])).exitCode).toBe(EXIT_CODES.usage)
  })

  it('maps invalid configuration to a usage error', async () => {
    const {exitCode, text} = await run(['status'], {NODE_ENV: 'test', RECONCILER_LISTEN_PROFILES_JSON: '{'})

    expect(exitCode).toBe(EXIT_CODES.usage)
    expect(JSON.parse(text)).toEqual({exitCode: 64, status: 'invalid_configuration'})
  })
})
