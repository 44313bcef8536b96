// SPDX-License-Identifier: Apache-2.0

import {type ClassConstructor} from 'class-transformer';
import {inject, injectable} from 'tsyringe-neo';
import {type Schema} from '../../api/schema.js';
import {SchemaBase} from '../../api/schema-base.js';
import {type SchemaMigration} from '../../api/schema-migration.js';
import {DeployedState} from '../../../model/state/deployed-state.js';
import {InjectTokens} from '../../../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../../../core/dependency-injection/container-helper.js';
import {type ObjectMapper} from '../../../../mapper/api/object-mapper.js';
import {DeployedStateV1Migration} from './deployed-state-v1-migration.js';

@injectable()
export class DeployedStateSchema extends SchemaBase<DeployedState> implements Schema<DeployedState> {
  public constructor(@inject(InjectTokens.ObjectMapper) mapper: ObjectMapper) {
    super(patchInject(mapper, InjectTokens.ObjectMapper, DeployedStateSchema.name));
  }

  public get name(): string {
    return DeployedState.name;
  }

  public get version(): number {
    return DeployedState.SCHEMA_VERSION;
  }

  public get classCtor(): ClassConstructor<DeployedState> {
    return DeployedState;
  }

  public get migrations(): SchemaMigration[] {
    return [new DeployedStateV1Migration()];
  }

  /**
   * Version lives in `metadata.version`; documents without a metadata block are the legacy flat map, and a metadata
   * block without a usable version is read as the current version.
   */
  public versionOf(data: Record<string, unknown>): number {
    const metadata: unknown = data.metadata;
    if (typeof metadata !== 'object' || metadata === null) {
      return 0;
    }

    const version: unknown = 'version' in metadata ? metadata.version : undefined;
    return typeof version === 'number' && Number.isSafeInteger(version) && version >= 0 ? version : this.version;
  }
}
