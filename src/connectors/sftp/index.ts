/**
 * SFTP connector: connection management and remote file discovery
 */

export { SftpConnection, createConnection } from './SftpConnection.js';
export type { ListedEntry, SftpConnectionOptions, SftpSession, RemoteEntry, RemoteEntryType, RemoteStat } from './SftpConnection.js';

export {
  getDefaultSftpConnectionProperties,
  validateSftpConnectionProperties,
  getSftpPropertiesSummary,
  getMaxBackoff,
} from './SftpConnectionProperties.js';
export type { SftpConnectionProperties } from './SftpConnectionProperties.js';

export {
  FileDiscovery,
  InvalidSearchPatternError,
  compilePattern,
  filterModifiedSince,
  joinRemotePath,
  matchFiles,
  sortByLastModified,
} from './FileDiscovery.js';
export type { FileDescriptor, FileDiscoveryOptions, RemoteDirectoryReader } from './FileDiscovery.js';

export {
  RemoteDirectoryNotFoundError,
  SftpAuthenticationError,
  SftpConnectionError,
  SftpTimeoutError,
  isAuthenticationFailure,
  isHandshakeDropped,
  isNoSuchFile,
} from './errors.js';
