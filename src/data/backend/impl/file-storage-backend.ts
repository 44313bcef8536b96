// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from '../api/storage-backend.js';
import {StorageOperation} from '../api/storage-operation.js';
import {
  type Stats,
  existsSync,
  lstatSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import {randomBytes} from 'node:crypto';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {PathEx} from '../../../core/util/path-ex.js';

/**
 * A file storage backend that operates on files within a specified base path. This backend does not support recursive
 * operations into subfolders and only operates on files contained within the specified base path. All directory entries
 * are ignored.
 *
 * Writes go to a temporary file in the base path which is then renamed over the target, so readers observe either the
 * previous or the new content.
 */
export class FileStorageBackend implements StorageBackend {
  /**
   * @param basePath - The base path to use for all file operations.
   * @throws IllegalArgumentError if the base path is null, undefined, or empty.
   * @throws StorageBackendError if the base path does not exist or is not a directory.
   */
  public constructor(public readonly basePath: string) {
    if (!basePath || basePath.trim().length === 0) {
      throw new IllegalArgumentError('basePath must not be null, undefined or empty');
    }

    let stats: Stats;
    try {
      stats = lstatSync(basePath);
    } catch (error) {
      throw new StorageBackendError('basePath must exist and be valid', error);
    }

    if (!stats.isDirectory()) {
      throw new StorageBackendError(`basePath must be a valid directory: ${basePath}`);
    }
  }

  public isSupported(op: StorageOperation): boolean {
    switch (op) {
      case StorageOperation.List:
      case StorageOperation.ReadBytes:
      case StorageOperation.WriteBytes:
      case StorageOperation.Delete: {
        return true;
      }
      default: {
        return false;
      }
    }
  }

  public async list(): Promise<string[]> {
    try {
      const entries: string[] = readdirSync(this.basePath, {encoding: 'utf8'});
      return entries.filter(item => statSync(PathEx.join(this.basePath, item)).isFile());
    } catch (error) {
      throw new StorageBackendError('Error listing files in base path', error);
    }
  }

  public async exists(key: string): Promise<boolean> {
    return existsSync(this.pathOf(key));
  }

  public async readBytes(key: string): Promise<Uint8Array> {
    const filePath: string = this.pathOf(key);
    try {
      return new Uint8Array(readFileSync(filePath));
    } catch (error) {
      throw new StorageBackendError(`error reading file: ${filePath}`, error);
    }
  }

  public async writeBytes(key: string, data: Uint8Array): Promise<void> {
    if (!data) {
      throw new IllegalArgumentError('data must not be null or undefined');
    }

    const filePath: string = this.pathOf(key);
    const temporaryPath: string = PathEx.join(this.basePath, `.${key}.${randomBytes(6).toString('hex')}.tmp`);
    try {
      this.writeTemporaryFile(temporaryPath, data);
      this.replaceFile(temporaryPath, filePath);
    } catch (error) {
      rmSync(temporaryPath, {force: true});
      throw new StorageBackendError(`error writing file: ${filePath}`, error);
    }
  }

  public async delete(key: string): Promise<void> {
    const filePath: string = this.pathOf(key);
    let stats: Stats;
    try {
      stats = statSync(filePath);
    } catch (error) {
      throw new StorageBackendError(`file not found or is not readable: ${filePath}`, error);
    }

    if (!stats.isFile()) {
      throw new StorageBackendError(`path is not a file: ${filePath}`);
    }

    try {
      unlinkSync(filePath);
    } catch (error) {
      throw new StorageBackendError(`error deleting file: ${filePath}`, error);
    }
  }

  protected writeTemporaryFile(temporaryPath: string, data: Uint8Array): void {
    writeFileSync(temporaryPath, data, {flag: 'wx'});
  }

  protected replaceFile(temporaryPath: string, filePath: string): void {
    renameSync(temporaryPath, filePath);
  }

  private pathOf(key: string): string {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be null, undefined or empty');
    }

    if (key.includes('/') || key.includes('\\')) {
      throw new IllegalArgumentError('key must name a file directly inside the base path', key);
    }

    return PathEx.join(this.basePath, key);
  }
}
