/**
 * Ordered key/value mapping produced by parsing a .env document.
 *
 * Keys keep the order of their first assignment; a later assignment to the
 * same key replaces the value.
 */
export type DotEnvVariables = Map<string, string>;

/**
 * Already-built variables accepted by a mapping load, either as a map or as
 * a plain record.
 */
export type DotEnvVariablesInput =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>;
