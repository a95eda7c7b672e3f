export type { ByteStream } from './ByteStream.js';
export { readAll, baseName } from './ByteStream.js';
export { expand, detectCompression } from './compression/expand.js';
export type { CompressionKind } from './compression/expand.js';
export { GpgDecryptor, DecryptionError, decryptedName } from './decrypt/GpgDecryptor.js';
export type { DecryptedFile, DecryptionOptions, Decryptor, GpgDecryptorOptions } from './decrypt/GpgDecryptor.js';
export { runCommand } from './decrypt/CommandRunner.js';
export type { CommandResult, CommandRunner } from './decrypt/CommandRunner.js';
export { FileExtractor } from './FileExtractor.js';
export type { ExtractedRow } from './FileExtractor.js';
