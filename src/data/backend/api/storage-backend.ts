// SPDX-License-Identifier: Apache-2.0

import {type StorageOperation} from './storage-operation.js';

/**
 * The storage backend implementations provide the logic to read and write desired state, run configs and the deployed
 * state cache to and from a storage medium.
 *
 * Storage backends should not attempt to interpret or validate the data being read or written, but should handle the
 * conversion of plain javascript objects to the underlying data format and vice versa.
 */
export interface StorageBackend {
  /**
   * List all keys in the storage backend. Not all storage backends support listing keys.
   *
   * @returns A list of keys in the storage backend.
   */
  list(): Promise<string[]>;

  /**
   * Checks whether the key is present in the storage backend.
   */
  exists(key: string): Promise<boolean>;

  /**
   * Reads the persisted data from the storage backend.
   *
   * @param key - The key to use to read the data from the storage backend. The key is implementation specific, for
   *              example a file name relative to the base path.
   * @returns The persisted data represented as a byte array.
   */
  readBytes(key: string): Promise<Uint8Array>;

  /**
   * Write the data to the storage backend. Implementations must never leave a partially written value behind.
   *
   * @param key - The key to use to write the data to the storage backend.
   * @param data - The persistent data represented as a byte array.
   */
  writeBytes(key: string, data: Uint8Array): Promise<void>;

  /**
   * Deletes the persisted data from the storage backend. Not all storage backends support deletion.
   *
   * @param key - The key to use to delete the data from the storage backend.
   */
  delete(key: string): Promise<void>;

  /**
   * Checks if the storage backend supports the given operation.
   *
   * @param op - The desired storage operation to check.
   * @returns True if the operation is supported, false otherwise.
   */
  isSupported(op: StorageOperation): boolean;
}
