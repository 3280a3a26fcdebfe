import type { Writable } from 'node:stream';

import { err, ok, type Result } from 'neverthrow';

/**
 * Write content to a stream and wait until it has been handed off.
 * Failures (EPIPE, a closed stream) come back as an err instead of an 'error' event.
 */
export function writeToStream(stream: Writable, content: string): Promise<Result<void, Error>> {
  return new Promise((resolve) => {
    // Stays attached after a failed write: the stream emits 'error' right after the callback
    const onError = (error: Error) => resolve(err(error));
    stream.once('error', onError);
    stream.write(content, (error) => {
      if (error) {
        resolve(err(error));
        return;
      }
      stream.off('error', onError);
      resolve(ok(undefined));
    });
  });
}
