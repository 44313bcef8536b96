// SPDX-License-Identifier: Apache-2.0

import {mkdirSync} from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type NetLogger} from '../logging/net-logger.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {type DeployedStateSchema} from '../../data/schema/migration/impl/state/deployed-state-schema.js';
import {JsonFileStorageBackend} from '../../data/backend/impl/json-file-storage-backend.js';
import {PathEx} from '../util/path-ex.js';
import {DeployedStateStore} from './deployed-state-store.js';

@injectable()
export class DeployedStateStoreFactory {
  private readonly stores = new Map<string, DeployedStateStore>();

  public constructor(
    @inject(InjectTokens.DeployedStateSchema) private readonly schema: DeployedStateSchema,
    @inject(InjectTokens.ObjectMapper) private readonly mapper: ObjectMapper,
    @inject(InjectTokens.NetLogger) private readonly logger: NetLogger,
  ) {
    this.schema = patchInject(schema, InjectTokens.DeployedStateSchema, this.constructor.name);
    this.mapper = patchInject(mapper, InjectTokens.ObjectMapper, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
  }

  /**
   * Returns the store for the given state file, creating its directory when needed. Repeated calls for the same file
   * share one store so that their writes are serialized.
   */
  public forFile(stateFile: string): DeployedStateStore {
    const absolute = PathEx.resolve(stateFile);
    const existing = this.stores.get(absolute);
    if (existing) {
      return existing;
    }

    const directory = path.dirname(absolute);
    mkdirSync(directory, {recursive: true});

    const store = new DeployedStateStore(
      new JsonFileStorageBackend(directory),
      path.basename(absolute),
      this.schema,
      this.mapper,
      this.logger,
    );
    this.stores.set(absolute, store);
    return store;
  }
}
