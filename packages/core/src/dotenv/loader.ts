import { Readable } from 'stream';
import type {
  DotEnvLoaderConfig,
  DotEnvVariables,
  DotEnvVariablesInput,
  IEnvironmentTable,
  LoadOptions,
} from '@envline/models';
import {
  DotEnvLoaderConfigSchema,
  LoadOptionsSchema,
  type ResolvedLoadOptions,
} from '@envline/schemas';
import { ProcessEnvironment } from '../environment/index.js';
import { createScopedLogger, type ILogger } from '../logging/index.js';
import { DotEnvFileError } from './errors.js';
import { readDotEnvFile, resolveDotEnvPath } from './file-loader.js';
import { parseDotEnvContent } from './parser.js';
import { readStreamText } from './stream-reader.js';

function isVariableMap(
  source: DotEnvVariablesInput,
): source is ReadonlyMap<string, string> {
  return source instanceof Map;
}

/**
 * Collaborators and settings for a {@link DotEnvLoader}.
 * @public
 */
export interface DotEnvLoaderOptions extends DotEnvLoaderConfig {
  /** Table variables are merged into (defaults to process.env) */
  environment?: IEnvironmentTable;
  /** Logger for load events (defaults to a pino logger scoped 'dotenv') */
  logger?: ILogger;
}

/**
 * Reads .env content from text, files, streams or mappings and merges it
 * into an environment table.
 *
 * Every load returns the mapping that was read, whether or not its keys
 * were written: an existing variable is only replaced when `overrideKeys`
 * is set.
 * @example
 * ```typescript
 * const loader = new DotEnvLoader({ baseDir: '/srv/app' });
 * loader.load();                                // reads /srv/app/.env
 * loader.loadString('PORT=8080', { overrideKeys: true });
 * ```
 * @public
 */
export class DotEnvLoader {
  private readonly environment: IEnvironmentTable;
  private readonly logger: ILogger;
  private readonly baseDir: string | undefined;
  private readonly defaultPath: string;

  public constructor(options: DotEnvLoaderOptions = {}) {
    const { environment, logger, ...config } = options;
    const resolved = DotEnvLoaderConfigSchema.parse(config);

    this.environment = environment ?? new ProcessEnvironment();
    this.logger = logger ?? createScopedLogger('dotenv');
    this.baseDir = resolved.baseDir;
    this.defaultPath = resolved.defaultPath;
  }

  /**
   * Parses .env content without touching the environment table.
   * @throws {DotEnvParseError} On the first invalid assignment
   */
  public parse(input: string | Buffer): DotEnvVariables;
  public parse(input: Readable, options?: LoadOptions): Promise<DotEnvVariables>;
  public parse(
    input: string | Buffer | Readable,
    options: LoadOptions = {},
  ): DotEnvVariables | Promise<DotEnvVariables> {
    if (input instanceof Readable) {
      const { encoding } = LoadOptionsSchema.parse(options);
      return readStreamText(input, encoding).then((text) =>
        parseDotEnvContent(text),
      );
    }

    return parseDotEnvContent(
      typeof input === 'string' ? input : input.toString('utf-8'),
    );
  }

  /**
   * Parses `text` and merges the result into the environment table.
   * @throws {DotEnvParseError} On the first invalid assignment; nothing is merged
   */
  public loadString(text: string, options: LoadOptions = {}): DotEnvVariables {
    const resolved = LoadOptionsSchema.parse(options);
    return this.merge(this.parseSource(text, 'string'), resolved);
  }

  /**
   * Loads a file, a stream or an already-built mapping.
   *
   * Without a source the configured default path (`.env`) is read.
   * @throws {DotEnvFileError} When the file cannot be read
   * @throws {DotEnvParseError} On the first invalid assignment
   */
  public load(source: Readable, options?: LoadOptions): Promise<DotEnvVariables>;
  public load(source?: string, options?: LoadOptions): DotEnvVariables;
  public load(
    source: DotEnvVariablesInput,
    options?: LoadOptions,
  ): DotEnvVariables;
  public load(
    source: string | DotEnvVariablesInput | Readable = this.defaultPath,
    options: LoadOptions = {},
  ): DotEnvVariables | Promise<DotEnvVariables> {
    const resolved = LoadOptionsSchema.parse(options);

    if (source instanceof Readable) {
      return this.loadStream(source, resolved);
    }

    if (typeof source === 'string') {
      return this.loadFile(source, resolved);
    }

    const variables = isVariableMap(source)
      ? new Map(source)
      : new Map(Object.entries(source));
    this.logger.debug('Loading variables from mapping', {
      keys: [...variables.keys()],
    });
    return this.merge(variables, resolved);
  }

  /**
   * Same as {@link DotEnvLoader.load} for a path, but returns null instead of
   * failing when the file does not exist. Any other failure propagates.
   */
  public loadIfExists(
    path: string = this.defaultPath,
    options: LoadOptions = {},
  ): DotEnvVariables | null {
    const resolved = LoadOptionsSchema.parse(options);

    try {
      return this.loadFile(path, resolved);
    } catch (error) {
      if (error instanceof DotEnvFileError && error.code === 'FILE_NOT_FOUND') {
        this.logger.debug('No .env file, skipping', { path: error.path });
        return null;
      }
      throw error;
    }
  }

  private loadFile(
    path: string,
    options: ResolvedLoadOptions,
  ): DotEnvVariables {
    const filePath = resolveDotEnvPath(path, this.baseDir);
    this.logger.debug('Loading .env file', { path: filePath });

    let content: string;
    try {
      content = readDotEnvFile(filePath, options.encoding);
    } catch (error) {
      if (
        !(error instanceof DotEnvFileError) ||
        error.code !== 'FILE_NOT_FOUND'
      ) {
        this.logger.error('Failed to read .env file', error, {
          path: filePath,
        });
      }
      throw error;
    }

    return this.merge(this.parseSource(content, filePath), options);
  }

  private async loadStream(
    stream: Readable,
    options: ResolvedLoadOptions,
  ): Promise<DotEnvVariables> {
    this.logger.debug('Loading variables from stream');
    const text = await readStreamText(stream, options.encoding);
    return this.merge(this.parseSource(text, 'stream'), options);
  }

  private parseSource(content: string, source: string): DotEnvVariables {
    try {
      return parseDotEnvContent(content);
    } catch (error) {
      this.logger.error('Failed to parse .env content', error, { source });
      throw error;
    }
  }

  /**
   * Writes each variable that is absent, or every variable when
   * `overrideKeys` is set. Keys are applied one at a time.
   */
  private merge(
    variables: DotEnvVariables,
    options: ResolvedLoadOptions,
  ): DotEnvVariables {
    const written: string[] = [];
    const kept: string[] = [];

    for (const [key, value] of variables) {
      if (this.environment.has(key) && !options.overrideKeys) {
        kept.push(key);
        continue;
      }
      this.environment.set(key, value);
      written.push(key);
    }

    this.logger.debug('Merged variables into environment', {
      read: variables.size,
      written,
      kept,
    });

    return variables;
  }
}
