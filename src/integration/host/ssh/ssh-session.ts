// SPDX-License-Identifier: Apache-2.0

import ssh2, {type Client, type SFTPWrapper} from 'ssh2';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {DeploymentError} from '../../../core/errors/deployment-error.js';
import {type IP} from '../../../types/aliases.js';
import * as constants from '../../../core/constants.js';

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * One authenticated SSH connection. Commands and transfers share the connection; `close()` ends it.
 */
export class SshSession {
  private constructor(
    private readonly client: Client,
    public readonly ip: IP,
    private readonly logger: NetLogger,
  ) {}

  public static open(
    ip: IP,
    user: string,
    privateKey: string,
    logger: NetLogger,
    readyTimeoutMs = 20_000,
  ): Promise<SshSession> {
    return new Promise((resolve, reject) => {
      const client = new ssh2.Client();
      let ready = false;

      client.on('error', (error: Error) => {
        if (ready) {
          logger.debug(`ssh connection to ${ip} reported: ${error.message}`);
        } else {
          reject(error);
        }
      });
      client.once('ready', () => {
        ready = true;
        resolve(new SshSession(client, ip, logger));
      });
      client.connect({host: ip, port: constants.SSH_PORT, username: user, privateKey, readyTimeout: readyTimeoutMs});
    });
  }

  public exec(command: string): Promise<ExecResult> {
    this.logger.debug(`[${this.ip}] $ ${command}`);

    return new Promise((resolve, reject) => {
      this.client.exec(command, (error, stream) => {
        if (error) {
          reject(error);
          return;
        }

        let stdout = '';
        let stderr = '';
        stream.on('data', (chunk: Buffer) => {
          stdout += chunk.toString('utf8');
        });
        stream.stderr.on('data', (chunk: Buffer) => {
          stderr += chunk.toString('utf8');
        });
        stream.on('close', (code: unknown) => {
          resolve({code: typeof code === 'number' ? code : -1, stdout, stderr});
        });
      });
    });
  }

  /**
   * Runs a command and returns its stdout
   * @throws DeploymentError when the command exits with a non-zero status
   */
  public async run(command: string): Promise<string> {
    const result = await this.exec(command);
    if (result.code !== 0) {
      throw new DeploymentError(
        `command failed on ${this.ip} with exit code ${result.code}: ${command}${result.stderr ? `: ${result.stderr.trim()}` : ''}`,
      );
    }
    return result.stdout;
  }

  public async upload(localPath: string, remotePath: string, mode: number): Promise<void> {
    this.logger.debug(`[${this.ip}] upload ${localPath} -> ${remotePath}`);
    const sftp = await this.openSftp();
    try {
      await new Promise<void>((resolve, reject) => {
        sftp.fastPut(localPath, remotePath, {mode}, error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    } finally {
      sftp.end();
    }
  }

  public async close(): Promise<void> {
    this.client.end();
  }

  private openSftp(): Promise<SFTPWrapper> {
    return new Promise((resolve, reject) => {
      this.client.sftp((error, sftp) => {
        if (error) {
          reject(error);
        } else {
          resolve(sftp);
        }
      });
    });
  }
}
