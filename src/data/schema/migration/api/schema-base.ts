// SPDX-License-Identifier: Apache-2.0

import {type ClassConstructor} from 'class-transformer';
import {type Schema} from './schema.js';
import {type SchemaMigration} from './schema-migration.js';
import {type ObjectMapper} from '../../../mapper/api/object-mapper.js';
import {SchemaMigrationError} from './schema-migration-error.js';

export abstract class SchemaBase<T> implements Schema<T> {
  public abstract get classCtor(): ClassConstructor<T>;
  public abstract get migrations(): SchemaMigration[];
  public abstract get name(): string;
  public abstract get version(): number;
  public abstract versionOf(data: Record<string, unknown>): number;

  protected constructor(protected readonly mapper: ObjectMapper) {}

  public async transform(data: Record<string, unknown>): Promise<T> {
    const clone: Record<string, unknown> = structuredClone(data);
    const migrated = await this.applyMigrations(clone, this.versionOf(clone));
    return this.mapper.fromObject(this.classCtor, migrated);
  }

  public validateMigrations(): void {
    const versionJumps: number[] = this.migrations.map(value => value.version).sort((l, r) => l - r);

    for (let index = 1; index < versionJumps.length; index++) {
      if (versionJumps[index] === versionJumps[index - 1]) {
        throw new SchemaMigrationError(`Duplicate migration version '${versionJumps[index]}'`);
      }
    }

    let currentVersion = 0;
    while (currentVersion < this.version) {
      const next = this.findMigrations(currentVersion)[0];
      if (!next) {
        throw new SchemaMigrationError(
          `No migration found for version '${currentVersion}'; there is a gap in the migration sequence`,
        );
      }
      currentVersion = next.version;
    }

    if (currentVersion !== this.version) {
      throw new SchemaMigrationError(
        `Migrations end at version '${currentVersion}' but the schema is at version '${this.version}'`,
      );
    }
  }

  protected async applyMigrations(
    data: Record<string, unknown>,
    dataVersion: number,
  ): Promise<Record<string, unknown>> {
    let migrations: SchemaMigration[] = this.findMigrations(dataVersion);

    while (migrations.length > 0) {
      const migration = migrations[0];
      data = await migration.migrate(data);
      dataVersion = migration.version;
      migrations = this.findMigrations(dataVersion);
    }

    return data;
  }

  protected findMigrations(dataVersion: number): SchemaMigration[] {
    return this.migrations
      .filter(value => value.range.from <= dataVersion && dataVersion < value.range.to)
      .sort((l, r) => l.version - r.version);
  }
}
