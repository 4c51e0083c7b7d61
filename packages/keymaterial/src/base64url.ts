const BASE64URL_REGEX = /^[A-Za-z0-9_-]+$/u;

export const X25519_KEY_BYTES = 32;

export const decodeBase64Url = (value: string): Buffer | null => {
  const normalized = value.trim();
  if (normalized.length === 0 || !BASE64URL_REGEX.test(normalized)) {
    return null;
  }

  if (normalized.length % 4 === 1) {
    return null;
  }

  const decoded = Buffer.from(normalized, 'base64url');
  if (decoded.length === 0) {
    return null;
  }

  // Reject encodings with non-zero trailing bits; they do not round-trip.
  if (decoded.toString('base64url') !== normalized) {
    return null;
  }

  return decoded;
};

export const encodeBase64Url = (value: Uint8Array) => Buffer.from(value).toString('base64url');
