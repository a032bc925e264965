import * as fs from 'node:fs';
import * as readline from 'node:readline';
import * as path from 'node:path';
import { stat } from 'node:fs/promises';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Check if a path exists and is a regular file
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Whether two paths name the same file, either by resolved path or, when
 * both exist, by device and inode
 */
export async function isSameFile(first: string, second: string): Promise<boolean> {
  if (path.resolve(first) === path.resolve(second)) {
    return true;
  }

  try {
    const [a, b] = await Promise.all([stat(first), stat(second)]);
    return a.dev === b.dev && a.ino === b.ino;
  } catch {
    return false;
  }
}

/**
 * Reads a UTF-8 text file one line at a time.
 *
 * `\n`, `\r\n` and a lone `\r` all end a line. A terminator at the very end
 * of the file does not produce an extra empty line, and a leading byte order
 * mark is dropped from the first line.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  let first = true;

  try {
    for await (const line of rl) {
      if (first && line.startsWith(BYTE_ORDER_MARK)) {
        yield line.slice(BYTE_ORDER_MARK.length);
      } else {
        yield line;
      }
      first = false;
    }
  } finally {
    rl.close();
    input.destroy();
  }
}
