import {z} from 'zod';

import {decodeBase64Url, X25519_KEY_BYTES} from './base64url.js';

export const KEY_MATERIAL_PATTERN = /^[A-Za-z0-9_-]{43}$/u;
export const SHORT_ID_PATTERN = /^[0-9a-f]{0,16}$/u;

export const KeyMaterialStringSchema = z
  .string()
  .regex(KEY_MATERIAL_PATTERN, 'must be 43 characters of URL-safe base64')
  .refine(value => decodeBase64Url(value)?.length === X25519_KEY_BYTES, 'must decode to a 32-byte x25519 key');

export const KeyPairSchema = z
  .object({
    privateKey: KeyMaterialStringSchema,
    publicKey: KeyMaterialStringSchema
  })
  .strict();

export type KeyPair = z.infer<typeof KeyPairSchema>;

export const ShortIdSchema = z.string().regex(SHORT_ID_PATTERN, 'must be 0-16 lowercase hex characters');

/** Ordered and duplicate-free; the empty string is a wildcard member. */
export const ShortIdSetSchema = z
  .array(ShortIdSchema)
  .min(1, 'must contain at least one short id')
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.forEach((shortId, index) => {
      if (seen.has(shortId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate short id "${shortId}"`,
          path: [index]
        });
      }
      seen.add(shortId);
    });
  });

export type ShortIdSet = z.infer<typeof ShortIdSetSchema>;

export const isKeyMaterialString = (value: string) => KeyMaterialStringSchema.safeParse(value).success;
