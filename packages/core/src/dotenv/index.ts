import { Readable } from 'stream';
import type {
  DotEnvVariables,
  DotEnvVariablesInput,
  LoadOptions,
} from '@envline/models';
import { DotEnvLoader } from './loader.js';

export { DotEnvLoader, type DotEnvLoaderOptions } from './loader.js';
export {
  parseDotEnvContent,
  safeParseDotEnvContent,
  type DotEnvParseResult,
} from './parser.js';
export { classifyLine, type ClassifiedLine } from './line-classifier.js';
export { parseKeyValue, type KeyValueParseResult } from './key-value-parser.js';
export {
  DotEnvError,
  DotEnvParseError,
  DotEnvSyntaxError,
  DotEnvFileError,
  type DotEnvErrorCode,
  type DotEnvSyntaxReason,
} from './errors.js';

let defaultLoader: DotEnvLoader | undefined;

/**
 * Loader bound to process.env and process.cwd(), created on first use.
 * @internal
 */
function getDefaultLoader(): DotEnvLoader {
  defaultLoader ??= new DotEnvLoader();
  return defaultLoader;
}

/**
 * Parses .env content without touching the environment.
 * @public
 */
export function parse(input: string | Buffer): DotEnvVariables;
export function parse(
  input: Readable,
  options?: LoadOptions,
): Promise<DotEnvVariables>;
export function parse(
  input: string | Buffer | Readable,
  options?: LoadOptions,
): DotEnvVariables | Promise<DotEnvVariables> {
  const loader = getDefaultLoader();
  return input instanceof Readable
    ? loader.parse(input, options)
    : loader.parse(input);
}

/**
 * Parses `text` and merges it into process.env.
 * @public
 */
export function loadString(
  text: string,
  options?: LoadOptions,
): DotEnvVariables {
  return getDefaultLoader().loadString(text, options);
}

/**
 * Loads a file (default `.env`), a stream or a mapping into process.env.
 * @public
 */
export function load(
  source: Readable,
  options?: LoadOptions,
): Promise<DotEnvVariables>;
export function load(source?: string, options?: LoadOptions): DotEnvVariables;
export function load(
  source: DotEnvVariablesInput,
  options?: LoadOptions,
): DotEnvVariables;
export function load(
  source?: string | DotEnvVariablesInput | Readable,
  options?: LoadOptions,
): DotEnvVariables | Promise<DotEnvVariables> {
  const loader = getDefaultLoader();
  if (source instanceof Readable) {
    return loader.load(source, options);
  }
  if (source === undefined || typeof source === 'string') {
    return loader.load(source, options);
  }
  return loader.load(source, options);
}

/**
 * Loads a file into process.env, or returns null when it does not exist.
 * @public
 */
export function loadIfExists(
  path?: string,
  options?: LoadOptions,
): DotEnvVariables | null {
  return getDefaultLoader().loadIfExists(path, options);
}
