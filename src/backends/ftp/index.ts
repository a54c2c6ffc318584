export { FtpFileSystem, FTP_ERROR_KINDS, connectFtp } from './FtpFileSystem.js';
export type { FtpListEntry, FtpSession } from './FtpFileSystem.js';
export { ControlChannelLock } from './ControlChannelLock.js';
export { ftpIdentity, getDefaultFtpSchemeProperties, validateFtpSchemeProperties } from './FtpSchemeProperties.js';
export type { FtpSchemeProperties } from './FtpSchemeProperties.js';
