/**
 * Connection properties for the FTP backend.
 */

export interface FtpSchemeProperties {
  host: string;
  /** Default 21 */
  port: number;
  username: string;
  password: string;
  /** Use explicit FTPS (TLS) */
  secure: boolean;
  /** Control connection timeout in ms; defaults to CAPFS_CONNECT_TIMEOUT */
  timeout?: number;
  /**
   * FTP commands sent immediately after login, in order.
   * Example: ["SITE UMASK 002"]
   */
  initialCommands: string[];
}

export function getDefaultFtpSchemeProperties(): FtpSchemeProperties {
  return {
    host: '',
    port: 21,
    username: 'anonymous',
    password: '',
    secure: false,
    initialCommands: [],
  };
}

/**
 * @throws Error if properties are invalid
 */
export function validateFtpSchemeProperties(props: FtpSchemeProperties): void {
  if (!props.host) {
    throw new Error('FTP host is required');
  }
  if (!Number.isInteger(props.port) || props.port <= 0 || props.port > 65535) {
    throw new Error(`Invalid FTP port: ${props.port}`);
  }
}

/** Endpoint name used as FileSystem.identity, e.g. "ftp://bob@example.org:21". */
export function ftpIdentity(props: Pick<FtpSchemeProperties, 'host' | 'port' | 'username' | 'secure'>): string {
  const scheme = props.secure ? 'ftps' : 'ftp';
  const user = props.username ? `${props.username}@` : '';
  return `${scheme}://${user}${props.host}:${props.port}`;
}
