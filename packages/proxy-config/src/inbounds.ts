import {isJsonObject, type JsonObject, type JsonValue, type ProxyConfig} from './document.js';

export const MANAGED_INBOUND_TAG_PATTERN = /^inbound-\d+$/u;

export const managedInboundTag = (port: number) => `inbound-${port}`;

export const isRealityInbound = (inbound: JsonValue): inbound is JsonObject =>
  isJsonObject(inbound) && isJsonObject(inbound.streamSettings) && inbound.streamSettings.security === 'reality';

export const hasManagedTag = (inbound: JsonValue): inbound is JsonObject =>
  isJsonObject(inbound) && typeof inbound.tag === 'string' && MANAGED_INBOUND_TAG_PATTERN.test(inbound.tag);

export const listInbounds = (config: ProxyConfig): JsonValue[] =>
  Array.isArray(config.inbounds) ? config.inbounds : [];

/**
 * An inbound of `config` is owned by the reconciler when it carries a tag the
 * synthesizer writes, or when it is the document's first Reality inbound (the
 * primary, adopted from installs that used their own tag). Other Reality
 * inbounds belong to the operator.
 */
export const createManagedInboundFilter = (config: ProxyConfig) => {
  const primary = listInbounds(config).find(isRealityInbound);
  return (inbound: JsonValue): inbound is JsonObject =>
    (primary !== undefined && inbound === primary) || hasManagedTag(inbound);
};

export const listManagedInbounds = (config: ProxyConfig): JsonObject[] =>
  listInbounds(config).filter(createManagedInboundFilter(config));

export const readObject = (parent: JsonObject, key: string): JsonObject | undefined => {
  const value = parent[key];
  return isJsonObject(value) ? value : undefined;
};

export const ensureObject = (parent: JsonObject, key: string): JsonObject => {
  const existing = readObject(parent, key);
  if (existing) {
    return existing;
  }

  const created: JsonObject = {};
  parent[key] = created;
  return created;
};
