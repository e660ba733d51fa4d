import {z} from 'zod';

export const KeyIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._:-]+$/u);

export const EnvelopeCiphertextSchema = z
  .object({
    version: z.literal(1),
    content_encryption_alg: z.literal('A256GCM'),
    key_encryption_alg: z.literal('A256GCMKW'),
    key_id: KeyIdSchema,
    wrapped_data_key_b64: z.base64().min(1).max(1024),
    iv_b64: z.base64().min(1).max(64),
    ciphertext_b64: z.base64().min(1).max(1_398_104),
    auth_tag_b64: z.base64().min(1).max(64),
    aad_b64: z.base64().min(1).max(4096).optional()
  })
  .strict();

export type EnvelopeCiphertext = z.infer<typeof EnvelopeCiphertextSchema>;

export const KeyringInputSchema = z
  .object({
    active_key_id: KeyIdSchema,
    keys: z.record(KeyIdSchema, z.base64().min(1).max(128))
  })
  .strict();

export type KeyringInput = z.infer<typeof KeyringInputSchema>;
