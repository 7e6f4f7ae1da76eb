import { z } from 'zod';
import { DotEnvLoaderConfigSchema, LoadOptionsSchema } from './config/index.js';

export * from './config/index.js';

export type ResolvedLoadOptions = z.infer<typeof LoadOptionsSchema>;
export type ResolvedDotEnvLoaderConfig = z.infer<typeof DotEnvLoaderConfigSchema>;
