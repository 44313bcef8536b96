// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import ssh2 from 'ssh2';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {ConfigurationError} from '../../../core/errors/configuration-error.js';
import {PathEx} from '../../../core/util/path-ex.js';

export interface SshKeyPair {
  privateKeyPath: string;
  /** OpenSSH formatted public key */
  publicKey: string;
}

/**
 * Returns the key pair at `privateKeyPath` (public half in `<path>.pub`), generating an ed25519 pair when neither file
 * exists.
 */
export function ensureSshKeyPair(privateKeyPath: string, logger: NetLogger): SshKeyPair {
  const keyFile = PathEx.resolve(privateKeyPath);
  const publicKeyFile = `${keyFile}.pub`;

  if (!fs.existsSync(keyFile)) {
    if (fs.existsSync(publicKeyFile)) {
      throw new ConfigurationError(`found ${publicKeyFile} without its private key ${keyFile}`);
    }

    logger.info(`Generating ssh key pair at ${keyFile}`);
    const generated = ssh2.utils.generateKeyPairSync('ed25519', {comment: 'deploynet'});
    fs.mkdirSync(path.dirname(keyFile), {recursive: true, mode: 0o700});
    fs.writeFileSync(keyFile, generated.private, {mode: 0o600});
    fs.writeFileSync(publicKeyFile, generated.public, {mode: 0o644});
  }

  if (!fs.existsSync(publicKeyFile)) {
    throw new ConfigurationError(`public key ${publicKeyFile} is missing for ${keyFile}`);
  }

  return {privateKeyPath: keyFile, publicKey: fs.readFileSync(publicKeyFile, 'utf8').trim()};
}
