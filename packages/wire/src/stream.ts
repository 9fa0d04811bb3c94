import type { Writable } from 'node:stream';
import { WriteError, toWriteError } from './errors.js';
import { toBytes, type WriteTo } from './write-to.js';

/**
 * Serialize a value and hand it to a writable stream in one chunk
 *
 * Resolves with the byte count once the stream has accepted the chunk.
 * A closed stream or a failed write rejects with WriteError.
 */
export function writeToStream(value: WriteTo, stream: Writable): Promise<number> {
  const bytes = toBytes(value);
  return new Promise((resolve, reject) => {
    if (stream.destroyed || stream.writableEnded) {
      reject(new WriteError('Stream is closed'));
      return;
    }
    stream.write(bytes, (err) => {
      if (err) {
        reject(toWriteError(err));
      } else {
        resolve(bytes.length);
      }
    });
  });
}
