export {
  SftpFileSystem,
  SFTP_ERROR_KINDS,
  buildConnectOptions,
  connectSftp,
  hostKeyFingerprint,
  hostKeyVerifier,
} from './SftpFileSystem.js';
export type { SftpSession } from './SftpFileSystem.js';
export {
  getDefaultSftpSchemeProperties,
  sftpIdentity,
  validateSftpSchemeProperties,
} from './SftpSchemeProperties.js';
export type { HostKeyChecking, SftpSchemeProperties } from './SftpSchemeProperties.js';
