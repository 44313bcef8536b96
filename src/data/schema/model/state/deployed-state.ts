// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Transform, Type, instanceToPlain, plainToInstance} from 'class-transformer';
import {DeployedStateMetadata} from './deployed-state-metadata.js';
import {DeployedNode} from './deployed-node.js';

function mapValues<R>(value: unknown, convert: (entry: object) => R): Record<string, R> {
  const result: Record<string, R> = {};
  if (typeof value !== 'object' || value === null) {
    return result;
  }

  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'object' && entry !== null) {
      result[key] = convert(entry);
    }
  }
  return result;
}

/**
 * The persisted deployment cache. Never the source of truth for node identity or configuration; entries exist only for
 * nodes whose infra stage succeeded.
 */
@Exclude()
export class DeployedState {
  public static readonly SCHEMA_VERSION = 1;

  @Expose()
  @Type(() => DeployedStateMetadata)
  public metadata: DeployedStateMetadata;

  @Expose()
  @Transform(({value}) => mapValues(value, entry => plainToInstance(DeployedNode, entry)), {toClassOnly: true})
  @Transform(({value}) => mapValues(value, entry => instanceToPlain(entry)), {toPlainOnly: true})
  public validators: Record<string, DeployedNode>;

  public constructor(metadata?: DeployedStateMetadata, validators?: Record<string, DeployedNode>) {
    this.metadata = metadata ?? new DeployedStateMetadata(undefined, undefined, undefined, DeployedState.SCHEMA_VERSION);
    this.validators = validators ?? {};
  }
}
