import {mkdtemp, rm, writeFile} from 'node:fs/promises';
import {tmpdir} from 'node:os';
import {join} from 'node:path';

import {KeyMaterialStringSchema, ShortIdSetSchema} from '@reality-reconciler/keymaterial';
import type {CommandRunner} from '@reality-reconciler/shared';
import {z} from 'zod';

import {checksumContent, parseConfigDocument, serializeConfig, type ProxyConfig} from './document.js';
import {err, ok, type ProxyConfigResult} from './errors.js';
import {createManagedInboundFilter, isRealityInbound} from './inbounds.js';

const SectionSchema = z.record(z.string(), z.unknown());

const RealitySettingsSchema = z
  .object({
    privateKey: KeyMaterialStringSchema,
    shortIds: ShortIdSetSchema,
    serverNames: z.array(z.string().min(1)).min(1),
    dest: z.string().min(1)
  })
  .passthrough();

const ManagedInboundSchema = z
  .object({
    listen: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    protocol: z.string().min(1),
    streamSettings: z
      .object({
        security: z.literal('reality'),
        realitySettings: RealitySettingsSchema
      })
      .passthrough()
  })
  .passthrough();

const ProxyConfigStructureSchema = z
  .object({
    log: SectionSchema.optional(),
    api: SectionSchema.optional(),
    stats: SectionSchema.optional(),
    policy: SectionSchema.optional(),
    inbounds: z.array(SectionSchema),
    outbounds: z.array(SectionSchema),
    routing: z.object({rules: z.array(SectionSchema)}).passthrough()
  })
  .passthrough();

const formatIssues = (error: z.ZodError) =>
  error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`).join('; ');

/** Phase 1: shape and managed-field checks, no I/O. */
export const validateStructure = (candidate: ProxyConfig): ProxyConfigResult<ProxyConfig> => {
  const structure = ProxyConfigStructureSchema.safeParse(candidate);
  if (!structure.success) {
    return err('structural_invalid', 'config document is missing required sections', {
      phase: 'structural',
      detail: formatIssues(structure.error)
    });
  }

  const inbounds = Array.isArray(candidate.inbounds) ? candidate.inbounds : [];
  const isManagedInbound = createManagedInboundFilter(candidate);
  const problems: string[] = [];
  const seenPorts = new Set<number>();
  let managedCount = 0;

  inbounds.forEach((inbound, index) => {
    if (!isManagedInbound(inbound)) {
      if (isRealityInbound(inbound) && typeof inbound.port === 'number') {
        if (seenPorts.has(inbound.port)) {
          problems.push(`inbounds.${index}.port: port ${inbound.port} is used by more than one Reality inbound`);
        }
        seenPorts.add(inbound.port);
      }
      return;
    }
    managedCount += 1;

    const parsed = ManagedInboundSchema.safeParse(inbound);
    if (!parsed.success) {
      problems.push(...parsed.error.issues.map(issue => `inbounds.${index}.${issue.path.join('.')}: ${issue.message}`));
      return;
    }

    if (seenPorts.has(parsed.data.port)) {
      problems.push(`inbounds.${index}.port: port ${parsed.data.port} is used by more than one Reality inbound`);
    }
    seenPorts.add(parsed.data.port);
  });

  if (managedCount === 0) {
    problems.push('inbounds: at least one Reality inbound is required');
  }

  if (problems.length > 0) {
    return err('structural_invalid', 'config document failed structural validation', {
      phase: 'structural',
      detail: problems.join('; ')
    });
  }

  return ok(candidate);
};

export type ValidConfig = {
  config: ProxyConfig;
  content: string;
  checksum: string;
  diagnostics: string;
};

export type ConfigValidatorOptions = {
  runner: CommandRunner;
  binaryPath: string;
  testArgs?: (configPath: string) => string[];
  timeoutMs?: number;
  tempRoot?: string;
};

export type ConfigValidator = {
  validate: (candidate: ProxyConfig | string) => Promise<ProxyConfigResult<ValidConfig>>;
};

const defaultTestArgs = (configPath: string) => ['run', '-test', '-config', configPath];

const combineDiagnostics = ({stdout, stderr}: {stdout: string; stderr: string}) =>
  [stdout.trim(), stderr.trim()].filter(part => part.length > 0).join('\n');

/**
 * Two-phase validation. The semantic phase runs the engine's test mode against
 * a private temporary copy; the live file is never read or written here.
 */
export const createConfigValidator = ({
  runner,
  binaryPath,
  testArgs = defaultTestArgs,
  timeoutMs = 15_000,
  tempRoot = tmpdir()
}: ConfigValidatorOptions): ConfigValidator => {
  const runEngineTest = async (content: string): Promise<ProxyConfigResult<string>> => {
    let directory: string | undefined;
    try {
      directory = await mkdtemp(join(tempRoot, 'reality-reconciler-'));
      const configPath = join(directory, 'candidate.json');
      await writeFile(configPath, content, {encoding: 'utf8', mode: 0o600});

      const result = await runner({command: binaryPath, args: testArgs(configPath), timeoutMs});
      if (!result.ok) {
        return err('validator_unavailable', result.error.message, {phase: 'semantic'});
      }

      const diagnostics = combineDiagnostics(result.value);
      if (result.value.exitCode !== 0) {
        return err('semantic_invalid', `engine rejected the candidate with status ${result.value.exitCode}`, {
          phase: 'semantic',
          detail: diagnostics
        });
      }

      return ok(diagnostics);
    } catch (error) {
      return err('validator_unavailable', 'could not stage the candidate for the engine test', {
        phase: 'semantic',
        detail: error instanceof Error ? error.message : String(error)
      });
    } finally {
      if (directory !== undefined) {
        await rm(directory, {recursive: true, force: true});
      }
    }
  };

  const validate = async (candidate: ProxyConfig | string): Promise<ProxyConfigResult<ValidConfig>> => {
    const document = typeof candidate === 'string' ? parseConfigDocument(candidate) : ok(candidate);
    if (!document.ok) {
      return document;
    }

    const structural = validateStructure(document.value);
    if (!structural.ok) {
      return structural;
    }

    const content = serializeConfig(structural.value);
    const semantic = await runEngineTest(content);
    if (!semantic.ok) {
      return semantic;
    }

    return ok({
      config: structural.value,
      content,
      checksum: checksumContent(content),
      diagnostics: semantic.value
    });
  };

  return {validate};
};
