import {KeyPairSchema, type KeyPair} from './contracts.js';

/**
 * A pure parser for one historical shape of the engine's `x25519` output.
 * Returns null when the text is not in this shape or the values are not
 * well-formed keys.
 */
export type KeyOutputFormatMatcher = {
  name: string;
  match: (text: string) => KeyPair | null;
};

const createLabelledMatcher = ({
  name,
  privateLabel,
  publicLabel
}: {
  name: string;
  privateLabel: RegExp;
  publicLabel: RegExp;
}): KeyOutputFormatMatcher => ({
  name,
  match: text => {
    const privateMatch = privateLabel.exec(text);
    const publicMatch = publicLabel.exec(text);
    if (!privateMatch?.[1] || !publicMatch?.[1]) {
      return null;
    }

    const parsed = KeyPairSchema.safeParse({
      privateKey: privateMatch[1].trim(),
      publicKey: publicMatch[1].trim()
    });
    return parsed.success ? parsed.data : null;
  }
});

// Newer engines print the public key under the "Password" label.
export const currentKeyOutputFormat = createLabelledMatcher({
  name: 'current',
  privateLabel: /^\s*PrivateKey:\s*(\S+)/mu,
  publicLabel: /^\s*Password:\s*(\S+)/mu
});

export const legacyKeyOutputFormat = createLabelledMatcher({
  name: 'legacy',
  privateLabel: /^\s*Private key:\s*(\S+)/mu,
  publicLabel: /^\s*Public key:\s*(\S+)/mu
});

export const DEFAULT_KEY_OUTPUT_FORMATS: readonly KeyOutputFormatMatcher[] = [
  currentKeyOutputFormat,
  legacyKeyOutputFormat
];

export const matchKeyOutput = (
  text: string,
  formats: readonly KeyOutputFormatMatcher[] = DEFAULT_KEY_OUTPUT_FORMATS
): {format: string; keyPair: KeyPair} | null => {
  for (const format of formats) {
    const keyPair = format.match(text);
    if (keyPair) {
      return {format: format.name, keyPair};
    }
  }

  return null;
};
