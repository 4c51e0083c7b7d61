export {decodeBase64Url, encodeBase64Url, X25519_KEY_BYTES} from './base64url.js';
export {
  isKeyMaterialString,
  KEY_MATERIAL_PATTERN,
  KeyMaterialStringSchema,
  KeyPairSchema,
  SHORT_ID_PATTERN,
  ShortIdSchema,
  ShortIdSetSchema,
  type KeyPair,
  type ShortIdSet
} from './contracts.js';
export {
  err,
  keyMaterialErrorCodeSchema,
  ok,
  type KeyMaterialError,
  type KeyMaterialErrorCode,
  type KeyMaterialFailure,
  type KeyMaterialResult,
  type KeyMaterialSuccess
} from './errors.js';
export {
  currentKeyOutputFormat,
  DEFAULT_KEY_OUTPUT_FORMATS,
  legacyKeyOutputFormat,
  matchKeyOutput,
  type KeyOutputFormatMatcher
} from './formats.js';
export {
  createKeyMaterialGenerator,
  deriveShortId,
  parseShortIdSet,
  type KeyMaterialGenerator,
  type KeyMaterialGeneratorOptions
} from './generator.js';
