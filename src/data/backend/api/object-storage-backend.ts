// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from './storage-backend.js';

export interface ObjectStorageBackend extends StorageBackend {
  /**
   * Reads the persisted data from the storage backend and marshals it into a plain javascript value.
   *
   * @param key - The key to use to read the data from the storage backend.
   * @returns The persisted data represented as a plain javascript value; callers validate its shape.
   */
  readObject(key: string): Promise<unknown>;

  /**
   * Write the data to the storage backend by marshalling the plain javascript object into the underlying
   * persistent data format.
   *
   * @param key - The key to use to write the data to the storage backend.
   * @param data - The persistent data represented as a plain javascript object.
   */
  writeObject(key: string, data: object): Promise<void>;
}
