// SPDX-License-Identifier: Apache-2.0

import {type ObjectStorageBackend} from '../api/object-storage-backend.js';
import {FileStorageBackend} from './file-storage-backend.js';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {StorageOperation} from '../api/storage-operation.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {PathEx} from '../../../core/util/path-ex.js';

export class JsonFileStorageBackend extends FileStorageBackend implements ObjectStorageBackend {
  public constructor(basePath: string) {
    super(basePath);
  }

  public override isSupported(op: StorageOperation): boolean {
    return op === StorageOperation.ReadObject || op === StorageOperation.WriteObject || super.isSupported(op);
  }

  public async readObject(key: string): Promise<unknown> {
    const data: Uint8Array = await this.readBytes(key);

    const filePath: string = PathEx.join(this.basePath, key);
    if (data.length === 0) {
      throw new StorageBackendError(`file is empty: ${filePath}`);
    }

    try {
      return JSON.parse(Buffer.from(data).toString('utf8'));
    } catch (error) {
      throw new StorageBackendError(`error parsing json file: ${filePath}`, error);
    }
  }

  public async writeObject(key: string, data: object): Promise<void> {
    if (!data) {
      throw new IllegalArgumentError('data must not be null or undefined');
    }

    await this.writeBytes(key, Buffer.from(JSON.stringify(data, undefined, 2) + '\n', 'utf8'));
  }
}
