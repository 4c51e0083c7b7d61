import {createHash} from 'node:crypto';

import {z} from 'zod';

import {err, ok, type ProxyConfigResult} from './errors.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = {[key: string]: JsonValue};

/** The engine's JSON document. Typed loosely so unknown keys survive edits. */
export type ProxyConfig = JsonObject;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseConfigDocument = (text: string): ProxyConfigResult<ProxyConfig> => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return err('document_not_json', 'config document is not valid JSON', {
      phase: 'structural',
      detail: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = JsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    return err('document_not_json', 'config document must be a JSON object', {phase: 'structural'});
  }

  return ok(parsed.data);
};

export const serializeConfig = (config: ProxyConfig): string => `${JSON.stringify(config, null, 2)}\n`;

export const checksumContent = (content: string | Uint8Array): string =>
  createHash('sha256').update(content).digest('hex');

export const configChecksum = (config: ProxyConfig): string => checksumContent(serializeConfig(config));
