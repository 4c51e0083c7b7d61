import {randomBytes} from 'node:crypto';

import type {CommandRunner} from '@reality-reconciler/shared';

import {KeyMaterialStringSchema, ShortIdSetSchema, type KeyPair, type ShortIdSet} from './contracts.js';
import {err, ok, type KeyMaterialResult} from './errors.js';
import {DEFAULT_KEY_OUTPUT_FORMATS, matchKeyOutput, type KeyOutputFormatMatcher} from './formats.js';

const SHORT_ID_BYTES = 8;
const DEFAULT_TIMEOUT_MS = 10_000;

export type KeyMaterialGeneratorOptions = {
  runner: CommandRunner;
  binaryPath: string;
  timeoutMs?: number;
  formats?: readonly KeyOutputFormatMatcher[];
};

export type KeyMaterialGenerator = {
  generate: () => Promise<KeyMaterialResult<KeyPair>>;
  derivePublicKey: (privateKey: string) => Promise<KeyMaterialResult<string>>;
  deriveShortId: () => string;
};

const combineOutput = ({stdout, stderr}: {stdout: string; stderr: string}) =>
  stderr.length > 0 ? `${stdout}\n${stderr}` : stdout;

export const deriveShortId = (): string => randomBytes(SHORT_ID_BYTES).toString('hex');

export const parseShortIdSet = (value: unknown): KeyMaterialResult<ShortIdSet> => {
  const parsed = ShortIdSetSchema.safeParse(value);
  if (!parsed.success) {
    return err('invalid_short_id_set', parsed.error.issues.map(issue => issue.message).join('; '));
  }

  return ok(parsed.data);
};

export const createKeyMaterialGenerator = ({
  runner,
  binaryPath,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  formats = DEFAULT_KEY_OUTPUT_FORMATS
}: KeyMaterialGeneratorOptions): KeyMaterialGenerator => {
  const runX25519 = async (extraArgs: string[]): Promise<KeyMaterialResult<string>> => {
    const result = await runner({command: binaryPath, args: ['x25519', ...extraArgs], timeoutMs});
    if (!result.ok) {
      return err('generator_unavailable', result.error.message);
    }

    const output = combineOutput(result.value);
    if (result.value.exitCode !== 0) {
      return err('generator_failed', `x25519 exited with status ${result.value.exitCode}`, output);
    }

    return ok(output);
  };

  const generate = async (): Promise<KeyMaterialResult<KeyPair>> => {
    const output = await runX25519([]);
    if (!output.ok) {
      return output;
    }

    const matched = matchKeyOutput(output.value, formats);
    if (!matched) {
      return err('unrecognized_output', 'x25519 output did not match any known key format', output.value);
    }

    return ok(matched.keyPair);
  };

  const derivePublicKey = async (privateKey: string): Promise<KeyMaterialResult<string>> => {
    const parsedPrivateKey = KeyMaterialStringSchema.safeParse(privateKey);
    if (!parsedPrivateKey.success) {
      return err('invalid_private_key', 'private key must be a 43-character URL-safe base64 x25519 key');
    }

    const output = await runX25519(['-i', parsedPrivateKey.data]);
    if (!output.ok) {
      return output;
    }

    const matched = matchKeyOutput(output.value, formats);
    if (!matched) {
      return err('unrecognized_output', 'x25519 -i output did not match any known key format', output.value);
    }

    // The capability must echo the key it was given; anything else is an unrelated pair.
    if (matched.keyPair.privateKey !== parsedPrivateKey.data) {
      return err('derived_key_mismatch', 'x25519 -i returned a different private key than requested');
    }

    return ok(matched.keyPair.publicKey);
  };

  return {generate, derivePublicKey, deriveShortId};
};
