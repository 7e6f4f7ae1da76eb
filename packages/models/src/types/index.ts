export type {
  DotEnvVariables,
  DotEnvVariablesInput,
} from './DotEnvVariables.js';
export type { DotEnvPair } from './DotEnvPair.js';
export type { IEnvironmentTable } from './IEnvironmentTable.js';
export type { DotEnvEncoding, LoadOptions } from './LoadOptions.js';
export type { DotEnvLoaderConfig } from './DotEnvLoaderConfig.js';
