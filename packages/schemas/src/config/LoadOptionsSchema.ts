import { z } from 'zod';
import type { DotEnvEncoding } from '@envline/models';

const ENCODINGS = [
  'utf-8',
  'utf8',
  'utf16le',
  'latin1',
  'ascii',
] as const satisfies readonly DotEnvEncoding[];

export const DotEnvEncodingSchema = z.enum(ENCODINGS);

export const LoadOptionsSchema = z
  .object({
    overrideKeys: z.boolean().default(false),
    encoding: DotEnvEncodingSchema.default('utf-8'),
  })
  .strict();
