import { describe, it, expect, jest } from '@jest/globals';
import { Readable } from 'stream';
import { gzipSync } from 'zlib';
import { SftpConnection } from '../../../src/connectors/sftp/SftpConnection.js';
import { parseExtractionConfig } from '../../../src/config/ExtractionConfig.js';
import { FileExtractor, ExtractedRow } from '../../../src/pipeline/FileExtractor.js';
import { MissingColumnsError } from '../../../src/datatypes/delimited/DelimitedParser.js';
import type { DecryptedFile, Decryptor } from '../../../src/pipeline/decrypt/GpgDecryptor.js';
import { FakeNode, FakeSftpSession } from '../../helpers/FakeSftpSession.js';
import { buildZip } from '../../helpers/zipArchive.js';

function connectionTo(nodes: Record<string, FakeNode>, decryptor?: Decryptor): SftpConnection {
  const session = new FakeSftpSession(nodes);
  return new SftpConnection({
    host: 'sftp.test',
    username: 'etl',
    password: 'test-password',
    clientFactory: () => session,
    decryptor,
  });
}

async function collect(rows: AsyncIterable<ExtractedRow>): Promise<ExtractedRow[]> {
  const result: ExtractedRow[] = [];
  for await (const row of rows) {
    result.push(row);
  }
  return result;
}

function summary(rows: ExtractedRow[]) {
  return rows.map((row) => ({
    file: row.descriptor.filepath,
    member: row.member,
    line: row.lineNumber,
    record: Object.fromEntries(row.record),
  }));
}

describe('FileExtractor', () => {
  const tree: Record<string, FakeNode> = {
    exports: { type: 'd' },
    'exports/orders-2.csv': { type: '-', content: 'id,total\n3,30\n', mtime: 200 },
    'exports/orders-1.csv': { type: '-', content: 'id,total\n1,10\n2,20\n', mtime: 100 },
    'exports/readme.txt': { type: '-', content: 'not data', mtime: 50 },
  };

  it('should discover matching files oldest first', async () => {
    const extractor = new FileExtractor(
      connectionTo(tree),
      parseExtractionConfig({ root_path: 'exports', search_pattern: '\\.csv$' })
    );

    const files = await extractor.discover();

    expect(files.map((file) => file.filepath)).toEqual(['exports/orders-1.csv', 'exports/orders-2.csv']);
  });

  it('should stream rows of every file with member and line number', async () => {
    const extractor = new FileExtractor(
      connectionTo(tree),
      parseExtractionConfig({ root_path: 'exports', search_pattern: '\\.csv$', table_name: 'orders' })
    );

    const rows = await collect(extractor.extract());

    expect(summary(rows)).toEqual([
      { file: 'exports/orders-1.csv', member: 'exports/orders-1.csv', line: 2, record: { id: '1', total: '10' } },
      { file: 'exports/orders-1.csv', member: 'exports/orders-1.csv', line: 3, record: { id: '2', total: '20' } },
      { file: 'exports/orders-2.csv', member: 'exports/orders-2.csv', line: 2, record: { id: '3', total: '30' } },
    ]);
  });

  it('should skip files not newer than modified_since', async () => {
    const extractor = new FileExtractor(
      connectionTo(tree),
      parseExtractionConfig({
        root_path: 'exports',
        search_pattern: '\\.csv$',
        modified_since: new Date(100_000).toISOString(),
      })
    );

    const rows = await collect(extractor.extract());

    expect(rows.map((row) => Object.fromEntries(row.record))).toEqual([{ id: '3', total: '30' }]);
  });

  it('should expand gzip and zip files before parsing', async () => {
    const extractor = new FileExtractor(
      connectionTo({
        in: { type: 'd' },
        'in/a.csv.gz': { type: '-', content: gzipSync('id\n1\n'), mtime: 1 },
        'in/b.zip': {
          type: '-',
          content: buildZip([
            { name: 'b1.csv', content: 'id\n2\n' },
            { name: 'b2.csv', content: 'id\n3\n4\n' },
          ]),
          mtime: 2,
        },
      }),
      parseExtractionConfig({ root_path: 'in', search_pattern: '.' })
    );

    const rows = await collect(extractor.extract());

    expect(summary(rows)).toEqual([
      { file: 'in/a.csv.gz', member: 'in/a.csv', line: 2, record: { id: '1' } },
      { file: 'in/b.zip', member: 'b1.csv', line: 2, record: { id: '2' } },
      { file: 'in/b.zip', member: 'b2.csv', line: 2, record: { id: '3' } },
      { file: 'in/b.zip', member: 'b2.csv', line: 3, record: { id: '4' } },
    ]);
  });

  it('should apply csv options from the config', async () => {
    const extractor = new FileExtractor(
      connectionTo({
        in: { type: 'd' },
        'in/data.psv': { type: '-', content: 'Order ID|Amount\n7|70|extra\n', mtime: 1 },
      }),
      parseExtractionConfig({
        root_path: 'in',
        search_pattern: 'psv',
        csv: { delimiter: '|', sanitize_headers: true, key_properties: 'order_id' },
      })
    );

    const rows = await collect(extractor.extract());

    expect(rows.map((row) => [...row.record])).toEqual([
      [
        ['order_id', '7'],
        ['amount', '70'],
        ['_sdc_extra', ['extra']],
      ],
    ]);
  });

  it('should number rows by their line in the file', async () => {
    const extractor = new FileExtractor(
      connectionTo({
        in: { type: 'd' },
        'in/gaps.csv': { type: '-', content: 'id\n1\n\n2\n', mtime: 1 },
      }),
      parseExtractionConfig({ root_path: 'in', search_pattern: 'gaps' })
    );

    const rows = await collect(extractor.extract());

    expect(rows.map((row) => row.lineNumber)).toEqual([2, 4]);
  });

  it('should fail the file when a key column is missing', async () => {
    const extractor = new FileExtractor(
      connectionTo(tree),
      parseExtractionConfig({ root_path: 'exports', search_pattern: '\\.csv$', csv: { key_properties: ['order_id'] } })
    );

    await expect(collect(extractor.extract())).rejects.toThrow(MissingColumnsError);
  });

  it('should decrypt before expanding and release the plaintext after each file', async () => {
    const close = jest.fn<DecryptedFile['close']>().mockResolvedValue(undefined);
    const decrypt = jest.fn<Decryptor['decrypt']>().mockImplementation(async (input) => {
      input.destroy();
      return {
        name: 'data.csv.gz',
        path: '/tmp/plain/data.csv.gz',
        directory: '/tmp',
        stream: Readable.from([gzipSync('id\n9\n')]),
        close,
      };
    });
    const extractor = new FileExtractor(
      connectionTo(
        {
          in: { type: 'd' },
          'in/data.csv.gz.gpg': { type: '-', content: 'ciphertext', mtime: 1 },
        },
        { decrypt }
      ),
      parseExtractionConfig({ root_path: 'in', search_pattern: 'gpg$', decryption: { key: 'test-key' } })
    );

    const rows = await collect(extractor.extract());

    expect(decrypt).toHaveBeenCalledWith(expect.any(Readable), 'in/data.csv.gz.gpg', {
      key: 'test-key',
      gnupgHome: undefined,
      passphrase: undefined,
    });
    expect(summary(rows)).toEqual([
      { file: 'in/data.csv.gz.gpg', member: 'data.csv', line: 2, record: { id: '9' } },
    ]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should close the source when the consumer stops early', async () => {
    const extractor = new FileExtractor(
      connectionTo(tree),
      parseExtractionConfig({ root_path: 'exports', search_pattern: 'orders-1' })
    );
    const [file] = await extractor.discover();
    if (!file) throw new Error('expected a file');

    const rows = extractor.extractFile(file);
    const first = await rows.next();
    await rows.return(undefined);

    if (first.done) throw new Error('expected a row');
    expect(first.value.lineNumber).toBe(2);
    expect(first.value.record.get('total')).toBe('10');
    await expect(rows.next()).resolves.toEqual({ done: true, value: undefined });
  });
});
