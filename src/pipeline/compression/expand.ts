/**
 * Decompression stage.
 *
 * The filename suffix decides how a stream is expanded:
 * - `.gz`  : one gunzipped stream, named without the suffix
 * - `.zip` : one stream per file member, in archive order
 * - other  : the input, unchanged
 *
 * Output is lazy: a zip's next member is only read once the consumer asks for it.
 */

import { pipeline } from 'stream';
import type { Readable } from 'stream';
import { createGunzip } from 'zlib';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import { ExtractError, errorMessage } from '../../errors.js';
import { ByteStream, readAll } from '../ByteStream.js';

export type CompressionKind = 'gzip' | 'zip' | 'none';

export function detectCompression(name: string): CompressionKind {
  const lower = name.toLowerCase();
  if (lower.endsWith('.gz')) return 'gzip';
  if (lower.endsWith('.zip')) return 'zip';
  return 'none';
}

export async function* expand(input: ByteStream): AsyncGenerator<ByteStream> {
  switch (detectCompression(input.name)) {
    case 'gzip':
      yield gunzip(input);
      return;

    case 'zip':
      yield* unzip(input);
      return;

    case 'none':
    default:
      yield input;
  }
}

function gunzip(input: ByteStream): ByteStream {
  const gunzipStream = createGunzip();
  // Errors on either side end up on the stream handed to the consumer
  pipeline(input.stream, gunzipStream, (error) => {
    if (error) gunzipStream.destroy(error);
  });
  return { name: input.name.slice(0, -'.gz'.length), stream: gunzipStream };
}

async function* unzip(input: ByteStream): AsyncGenerator<ByteStream> {
  // Zip's central directory sits at the end, so the archive is buffered first
  const content = await readAll(input.stream);
  const zipfile = await openZip(content, input.name);

  for (;;) {
    const entry = await nextEntry(zipfile, input.name);
    if (!entry) return;
    if (entry.fileName.endsWith('/')) continue;
    yield { name: entry.fileName, stream: await openEntry(zipfile, entry, input.name) };
  }
}

function openZip(content: Buffer, name: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(content, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(new ExtractError(`Cannot read zip archive ${name}: ${errorMessage(err ?? 'no archive returned')}`, { cause: err }));
        return;
      }
      resolve(zipfile);
    });
  });
}

function nextEntry(zipfile: ZipFile, name: string): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const onEntry = (entry: Entry): void => {
      cleanup();
      resolve(entry);
    };
    const onEnd = (): void => {
      cleanup();
      resolve(null);
    };
    const onError = (error: Error): void => {
      cleanup();
      reject(new ExtractError(`Cannot read zip archive ${name}: ${error.message}`, { cause: error }));
    };
    const cleanup = (): void => {
      zipfile.off('entry', onEntry);
      zipfile.off('end', onEnd);
      zipfile.off('error', onError);
    };

    zipfile.on('entry', onEntry);
    zipfile.on('end', onEnd);
    zipfile.on('error', onError);
    zipfile.readEntry();
  });
}

function openEntry(zipfile: ZipFile, entry: Entry, name: string): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(
          new ExtractError(`Cannot read ${entry.fileName} from zip archive ${name}: ${errorMessage(err ?? 'no stream returned')}`, {
            cause: err,
          })
        );
        return;
      }
      resolve(stream);
    });
  });
}
