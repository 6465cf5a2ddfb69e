import type { Section } from '../types/config.types.js';
import type { Server } from '../types/deploy.types.js';
import { ConfigError } from './errors.js';
import { FtpServer } from './servers/ftp.js';
import { SshServer } from './servers/ssh.js';

const SECURE_SHELL_SCHEMES = new Set(['sftp:', 'ssh:']);

/**
 * Parses a section's remote URL; anything without a scheme and a host is rejected.
 */
export function parseRemote(remote: string | undefined): URL {
  let url: URL;
  try {
    url = new URL(remote ?? '');
  } catch {
    throw new ConfigError("Missing or invalid 'remote' URL in config.");
  }
  if (!url.hostname) {
    throw new ConfigError("Missing or invalid 'remote' URL in config.");
  }
  return url;
}

export function createServer(section: Section): Server {
  const url = parseRemote(section.remote);
  const permissions = {
    filePermissions: section.filePermissions,
    dirPermissions: section.dirPermissions,
  };

  return SECURE_SHELL_SCHEMES.has(url.protocol)
    ? new SshServer({ url: section.remote, ...permissions })
    : new FtpServer({ url: section.remote, passiveMode: section.passiveMode, ...permissions });
}
