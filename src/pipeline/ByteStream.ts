import type { Readable } from 'stream';

/**
 * A named readable byte stream. Every pipeline stage takes one and produces
 * one or more, so raw, decrypted and decompressed streams compose in any order.
 *
 * `name` is what later stages key off (a `.gz` or `.zip` suffix, for example).
 */
export interface ByteStream {
  readonly name: string;
  readonly stream: Readable;
}

/**
 * Read a stream fully into memory
 */
export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Last segment of a `/`-separated remote path
 */
export function baseName(filepath: string): string {
  const segments = filepath.split('/');
  return segments[segments.length - 1] ?? filepath;
}
