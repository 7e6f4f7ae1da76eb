import type { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import type { DotEnvEncoding } from '@envline/models';

/**
 * Reads a stream to its end and decodes the whole content at once.
 *
 * The stream is consumed but not closed or destroyed on the caller's behalf.
 * @internal
 */
export async function readStreamText(
  stream: Readable,
  encoding: DotEnvEncoding,
): Promise<string> {
  const content = await buffer(stream);
  return content.toString(encoding);
}
