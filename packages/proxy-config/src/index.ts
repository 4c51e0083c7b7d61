export {API_INBOUND_PORT, createDefaultConfig, createDefaultRealityInbound, DEFAULT_LISTEN_ADDRESS} from './defaults.js';
export {
  checksumContent,
  configChecksum,
  isJsonObject,
  JsonObjectSchema,
  parseConfigDocument,
  serializeConfig,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
  type ProxyConfig
} from './document.js';
export {
  err,
  ok,
  proxyConfigErrorCodeSchema,
  type ProxyConfigError,
  type ProxyConfigErrorCode,
  type ProxyConfigFailure,
  type ProxyConfigResult,
  type ProxyConfigSuccess,
  type ValidationPhase
} from './errors.js';
export {readRealityIdentity, type RealityIdentity} from './identity.js';
export {
  createManagedInboundFilter,
  hasManagedTag,
  isRealityInbound,
  listInbounds,
  listManagedInbounds,
  MANAGED_INBOUND_TAG_PATTERN,
  managedInboundTag
} from './inbounds.js';
export {ListenProfileSchema, synthesize, type ListenProfile, type SynthesizeInput} from './synthesize.js';
export {
  createConfigValidator,
  validateStructure,
  type ConfigValidator,
  type ConfigValidatorOptions,
  type ValidConfig
} from './validate.js';
