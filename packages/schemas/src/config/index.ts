export { DotEnvEncodingSchema, LoadOptionsSchema } from './LoadOptionsSchema.js';
export { DotEnvLoaderConfigSchema } from './DotEnvLoaderConfigSchema.js';
