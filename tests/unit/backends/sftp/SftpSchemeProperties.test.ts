import { describe, it, expect } from '@jest/globals';
import {
  getDefaultSftpSchemeProperties,
  sftpIdentity,
  validateSftpSchemeProperties,
} from '../../../../src/backends/sftp/SftpSchemeProperties.js';
import type { SftpSchemeProperties } from '../../../../src/backends/sftp/SftpSchemeProperties.js';

describe('SftpSchemeProperties', () => {
  const valid: SftpSchemeProperties = {
    ...getDefaultSftpSchemeProperties(),
    host: 'files.test',
    hostKeyFingerprint: 'SHA256:test-fingerprint',
  };

  it('should default to password auth on port 22 with host key checking', () => {
    const defaults = getDefaultSftpSchemeProperties();
    expect(defaults.port).toBe(22);
    expect(defaults.passwordAuth).toBe(true);
    expect(defaults.keyAuth).toBe(false);
    expect(defaults.hostKeyChecking).toBe('yes');
    expect(defaults.hostKeyFingerprint).toBe('');
    expect(defaults.timeout).toBeUndefined();
  });

  it('should accept a host with password auth', () => {
    expect(() => validateSftpSchemeProperties(valid)).not.toThrow();
  });

  it('should require a host', () => {
    expect(() => validateSftpSchemeProperties(getDefaultSftpSchemeProperties())).toThrow('SFTP host is required');
  });

  it('should require an authentication method', () => {
    expect(() => validateSftpSchemeProperties({ ...valid, passwordAuth: false })).toThrow(
      'At least one authentication method (password or key) must be enabled'
    );
  });

  it('should require a key file for key auth', () => {
    expect(() => validateSftpSchemeProperties({ ...valid, keyAuth: true })).toThrow(
      'Key file path is required when key authentication is enabled'
    );
  });

  it('should require a fingerprint when checking host keys', () => {
    expect(() => validateSftpSchemeProperties({ ...valid, hostKeyFingerprint: '' })).toThrow(
      'A host key fingerprint is required when host key checking is enabled'
    );
    expect(() =>
      validateSftpSchemeProperties({ ...valid, hostKeyChecking: 'no', hostKeyFingerprint: '' })
    ).not.toThrow();
  });

  it('should name the endpoint with and without a user', () => {
    expect(sftpIdentity({ host: 'files.test', port: 22, username: 'alice' })).toBe('sftp://alice@files.test:22');
    expect(sftpIdentity({ host: 'files.test', port: 2222, username: '' })).toBe('sftp://files.test:2222');
  });
});
