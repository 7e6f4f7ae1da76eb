import { z } from 'zod';

export const DotEnvLoaderConfigSchema = z
  .object({
    baseDir: z.string().min(1).optional(),
    defaultPath: z.string().min(1).default('.env'),
  })
  .strict();
