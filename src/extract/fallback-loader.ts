import { readFile } from 'node:fs/promises';
import { FallbackUnavailableError, errorMessage } from '../lib/errors.js';
import { decodePayload, type RawPayload } from './raw-payload.js';

/**
 * Load the committed fallback payload. Missing, unreadable or malformed
 * files all surface as FallbackUnavailableError.
 */
export async function loadFallbackPayload(path: string): Promise<RawPayload> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new FallbackUnavailableError(
      `Fallback payload could not be read from ${path}: ${errorMessage(err)}`,
      path,
      { cause: err },
    );
  }

  const decoded = decodePayload(text);
  if (!decoded.ok) {
    throw new FallbackUnavailableError(`Fallback payload at ${path} is unusable: ${decoded.reason}`, path);
  }
  return decoded.payload;
}
