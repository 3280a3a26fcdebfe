import { PassThrough, Writable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { writeToStream } from '../output-stream.js';

describe('writeToStream', () => {
  it('should resolve ok once the content is written', async () => {
    const stream = new PassThrough();

    const result = await writeToStream(stream, 'client,available\n');

    expect(result.isOk()).toBe(true);
    expect(String(stream.read())).toBe('client,available\n');
    expect(stream.listenerCount('error')).toBe(0);
  });

  it('should resolve err when the stream fails', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });

    const result = await writeToStream(stream, 'data');

    expect(result._unsafeUnwrapErr().message).toBe('EPIPE');
  });
});
