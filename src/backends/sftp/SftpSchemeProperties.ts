/**
 * Connection properties for the SFTP backend.
 */

/**
 * Host key checking modes
 * - 'yes': accept only the host key matching hostKeyFingerprint
 * - 'no': accept any host key (test servers only)
 */
export type HostKeyChecking = 'yes' | 'no';

export interface SftpSchemeProperties {
  host: string;
  /** Default 22 */
  port: number;
  username: string;
  password: string;

  /** Enable password authentication */
  passwordAuth: boolean;

  /** Enable public key authentication */
  keyAuth: boolean;

  /** Path to private key file (for key-based auth) */
  keyFile: string;

  /** Passphrase for encrypted private key */
  passPhrase: string;

  hostKeyChecking: HostKeyChecking;

  /** Expected host key, as printed by `ssh-keygen -lf`: "SHA256:<base64>" */
  hostKeyFingerprint: string;

  /** Ready timeout in ms; defaults to CAPFS_CONNECT_TIMEOUT */
  timeout?: number;
}

export function getDefaultSftpSchemeProperties(): SftpSchemeProperties {
  return {
    host: '',
    port: 22,
    username: '',
    password: '',
    passwordAuth: true,
    keyAuth: false,
    keyFile: '',
    passPhrase: '',
    hostKeyChecking: 'yes',
    hostKeyFingerprint: '',
  };
}

/**
 * @throws Error if properties are invalid
 */
export function validateSftpSchemeProperties(props: SftpSchemeProperties): void {
  if (!props.host) {
    throw new Error('SFTP host is required');
  }

  // At least one authentication method must be enabled
  if (!props.passwordAuth && !props.keyAuth) {
    throw new Error('At least one authentication method (password or key) must be enabled');
  }

  if (props.keyAuth && !props.keyFile) {
    throw new Error('Key file path is required when key authentication is enabled');
  }

  if (props.hostKeyChecking === 'yes' && !props.hostKeyFingerprint) {
    throw new Error('A host key fingerprint is required when host key checking is enabled');
  }
}

/** Endpoint name used as FileSystem.identity, e.g. "sftp://alice@example.org:22". */
export function sftpIdentity(props: Pick<SftpSchemeProperties, 'host' | 'port' | 'username'>): string {
  const user = props.username ? `${props.username}@` : '';
  return `sftp://${user}${props.host}:${props.port}`;
}
