// SPDX-License-Identifier: Apache-2.0

import {type ObjectStorageBackend} from '../../data/backend/api/object-storage-backend.js';
import {StorageOperation} from '../../data/backend/api/storage-operation.js';
import {type Schema} from '../../data/schema/migration/api/schema.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {DeployedState} from '../../data/schema/model/state/deployed-state.js';
import {DeployedNode, type DeployedNodeFields} from '../../data/schema/model/state/deployed-node.js';
import {type NetLogger} from '../logging/net-logger.js';
import {SerialLock} from '../lock/serial-lock.js';
import {StateStoreError} from '../errors/state-store-error.js';
import {DeployNetError} from '../errors/deploy-net-error.js';
import {type IP, type NodeName} from '../../types/aliases.js';

/**
 * Local cache of what the infra stage provisioned. Reads are served from memory after `load()`; every mutation
 * rewrites the whole file atomically, one mutation at a time.
 */
export class DeployedStateStore {
  private state: DeployedState = new DeployedState();
  private loaded = false;
  private readonly lock = new SerialLock();

  /**
   * @param backend - storage holding the state file
   * @param key - name of the state file inside the backend
   */
  public constructor(
    private readonly backend: ObjectStorageBackend,
    public readonly key: string,
    private readonly schema: Schema<DeployedState>,
    private readonly mapper: ObjectMapper,
    private readonly logger: NetLogger,
  ) {}

  /**
   * Reads the state file. A missing file yields an empty state; an unreadable or corrupt one is reported and treated
   * as empty, and a newer schema version is read as far as it maps.
   */
  public async load(): Promise<DeployedState> {
    return this.lock.runExclusive(async () => {
      this.state = await this.read();
      this.loaded = true;
      return this.state;
    });
  }

  public getIp(nodeName: NodeName): IP | undefined {
    const ip = this.state.validators[nodeName]?.ip;
    return ip ? ip : undefined;
  }

  public get(nodeName: NodeName): DeployedNode | undefined {
    return this.state.validators[nodeName];
  }

  public entries(): DeployedNode[] {
    return Object.values(this.state.validators);
  }

  /**
   * Merges the given fields into the node's entry, creating it when absent, and persists the store.
   */
  public async upsert(nodeName: NodeName, fields: DeployedNodeFields): Promise<DeployedNode> {
    return this.mutate(state => {
      const current = state.validators[nodeName] ?? new DeployedNode(nodeName);
      const next = new DeployedNode(
        nodeName,
        fields.team ?? current.team,
        fields.address ?? current.address,
        fields.peerId ?? current.peerId,
        fields.ip ?? current.ip,
      );
      state.validators[nodeName] = next;
      return next;
    });
  }

  public async remove(nodeName: NodeName): Promise<boolean> {
    return this.mutate(state => {
      const present = nodeName in state.validators;
      delete state.validators[nodeName];
      return present;
    });
  }

  /** Replaces every entry, as done when the cache is rebuilt from live instances */
  public async replaceAll(nodes: readonly DeployedNode[]): Promise<void> {
    await this.mutate(state => {
      state.validators = Object.fromEntries(nodes.map(node => [node.nodeName, node]));
    });
  }

  public async setMetadata(project: string, zone: string): Promise<void> {
    await this.mutate(state => {
      state.metadata.project = project;
      state.metadata.zone = zone;
    });
  }

  /** Deletes the state file; returns false when there was none */
  public async reset(): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      this.state = new DeployedState();
      this.loaded = true;
      if (!(await this.backend.exists(this.key))) {
        return false;
      }
      if (!this.backend.isSupported(StorageOperation.Delete)) {
        throw new StateStoreError(`state backend cannot delete ${this.key}`);
      }
      await this.backend.delete(this.key);
      return true;
    });
  }

  private async mutate<R>(change: (state: DeployedState) => R): Promise<R> {
    return this.lock.runExclusive(async () => {
      if (!this.loaded) {
        this.state = await this.read();
        this.loaded = true;
      }

      const before: Record<string, unknown> = this.mapper.toObject(this.state);
      const result = change(this.state);
      this.state.metadata.generatedAt = new Date().toISOString();
      this.state.metadata.version = this.schema.version;

      try {
        await this.backend.writeObject(this.key, this.mapper.toObject(this.state));
      } catch (error) {
        // keep memory in step with the file that is still on disk
        this.state = this.mapper.fromObject(DeployedState, before);
        throw new StateStoreError(`unable to persist deployed state to ${this.key}`, error);
      }

      return result;
    });
  }

  private async read(): Promise<DeployedState> {
    if (!(await this.backend.exists(this.key))) {
      this.logger.debug(`No deployed state at ${this.key}, starting empty`);
      return new DeployedState();
    }

    try {
      const data: unknown = await this.backend.readObject(this.key);
      if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        this.logger.warn(`Deployed state ${this.key} is not a JSON object, ignoring it`);
        return new DeployedState();
      }

      const record: Record<string, unknown> = {...data};
      const version = this.schema.versionOf(record);
      if (version > this.schema.version) {
        this.logger.warn(
          `Deployed state ${this.key} has version ${version}, newer than supported ${this.schema.version}; reading it best-effort`,
        );
      }

      const state = await this.schema.transform(record);
      return state;
    } catch (error) {
      this.logger.warn(`Deployed state ${this.key} is unreadable, ignoring it: ${DeployNetError.messageOf(error)}`);
      return new DeployedState();
    }
  }
}
