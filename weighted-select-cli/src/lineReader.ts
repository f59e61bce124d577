/**
 * Line-by-line file reading as an async iterable
 */

import { createReadStream } from 'fs';
import { once } from 'events';
import { createInterface } from 'readline';
import { basename } from 'path';
import type { MergedLine } from './types.js';

/**
 * Yield the lines of a UTF-8 text file without their line endings
 * Rejects on the first next() if the file cannot be opened
 */
export async function* readLines(path: string): AsyncGenerator<string, void, undefined> {
  const input = createReadStream(path, { encoding: 'utf8' });

  try {
    // Surface ENOENT/EACCES before handing the stream to readline
    await once(input, 'open');

    const lines = createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
    }
  } finally {
    input.destroy();
  }
}

/**
 * Lines of a file tagged with the file's basename
 */
export async function* readTaggedLines(path: string): AsyncGenerator<MergedLine, void, undefined> {
  const source = basename(path);
  for await (const line of readLines(path)) {
    yield { source, line };
  }
}
