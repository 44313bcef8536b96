// SPDX-License-Identifier: Apache-2.0

import {type SchemaMigration} from '../../api/schema-migration.js';
import {InvalidSchemaVersionError} from '../../api/invalid-schema-version-error.js';

/**
 * Converts the flat `{node_name: {node_name, address}}` map written by the first deploy scripts into the versioned
 * document with a metadata block.
 */
export class DeployedStateV1Migration implements SchemaMigration {
  public get range(): {from: number; to: number} {
    return {from: 0, to: 1};
  }

  public get version(): number {
    return 1;
  }

  public async migrate(source: Record<string, unknown>): Promise<Record<string, unknown>> {
    if ('metadata' in source || 'validators' in source) {
      // a versioned document never reaches this migration
      throw new InvalidSchemaVersionError(0, this.version);
    }

    const validators: Record<string, Record<string, string>> = {};
    for (const [name, entry] of Object.entries(source)) {
      if (typeof entry !== 'object' || entry === null) {
        continue;
      }

      const row: Record<string, unknown> = {...entry};
      validators[name] = {
        node_name: typeof row.node_name === 'string' ? row.node_name : name,
        team: typeof row.team === 'string' ? row.team : '',
        address: typeof row.address === 'string' ? row.address : '',
        peer_id: typeof row.peer_id === 'string' ? row.peer_id : '',
        ip: typeof row.ip === 'string' ? row.ip : '',
      };
    }

    return {
      metadata: {project: '', zone: '', generated_at: new Date().toISOString(), version: this.version},
      validators,
    };
  }
}
