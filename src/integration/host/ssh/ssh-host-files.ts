// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {type HostFiles} from '../host.js';
import {type SshSession} from './ssh-session.js';
import {quote} from './shell.js';

export class SshHostFiles implements HostFiles {
  private homeDirectory?: string;

  public constructor(private readonly session: SshSession) {}

  public async home(): Promise<string> {
    this.homeDirectory ??= (await this.session.run('printf %s "$HOME"')).trim();
    return this.homeDirectory;
  }

  public async ensureDirectory(remotePath: string): Promise<void> {
    await this.session.run(`mkdir -p ${quote(remotePath)}`);
  }

  public async upload(localPath: string, remotePath: string, mode = 0o644): Promise<void> {
    await this.ensureDirectory(path.posix.dirname(remotePath));
    await this.session.upload(localPath, remotePath, mode);
    // sftp applies the mode only to new files
    await this.session.run(`chmod ${mode.toString(8)} ${quote(remotePath)}`);
  }
}
