import {KeyMaterialStringSchema, ShortIdSetSchema} from '@reality-reconciler/keymaterial';
import {z} from 'zod';

export const CREDENTIAL_KEYS = {
  privateKey: 'XRAY_REALITY_PRIVKEY',
  publicKey: 'XRAY_REALITY_PUBKEY',
  shortIds: 'XRAY_REALITY_SHORT_IDS',
  serverAddress: 'SERVER_IP'
} as const;

export type CredentialKey = (typeof CREDENTIAL_KEYS)[keyof typeof CREDENTIAL_KEYS];

export const CredentialRecordSchema = z
  .object({
    privateKey: KeyMaterialStringSchema,
    publicKey: KeyMaterialStringSchema,
    shortIds: ShortIdSetSchema,
    serverAddress: z.string().trim().min(1).optional()
  })
  .strict();

export type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

export type ManagedEntry = readonly [CredentialKey, string];

/** Store lines for a record, in the order they are appended. */
export const toManagedEntries = (record: CredentialRecord): ManagedEntry[] => [
  [CREDENTIAL_KEYS.privateKey, record.privateKey],
  [CREDENTIAL_KEYS.publicKey, record.publicKey],
  [CREDENTIAL_KEYS.shortIds, JSON.stringify(record.shortIds)],
  ...(record.serverAddress !== undefined ? [[CREDENTIAL_KEYS.serverAddress, record.serverAddress] as const] : [])
];

const StoredShortIdsSchema = z.array(z.string());

/** Reads the JSON array form and the older comma-separated form. */
export const parseStoredShortIds = (value: string): string[] | undefined => {
  const trimmed = value.trim();
  if (!trimmed.startsWith('[')) {
    return trimmed.split(',').map(shortId => shortId.trim());
  }

  try {
    const parsed = StoredShortIdsSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data : undefined;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
};

/** Compares a stored value with the value a record would write. */
export const storedValueMatches = ({key, stored, expected}: {key: CredentialKey; stored: string; expected: string}) => {
  if (key !== CREDENTIAL_KEYS.shortIds) {
    return stored.trim() === expected;
  }
  const storedIds = parseStoredShortIds(stored);
  return storedIds !== undefined && JSON.stringify(storedIds) === expected;
};
