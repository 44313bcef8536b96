// SPDX-License-Identifier: Apache-2.0

/**
 * Represents a schema migration which can be applied to a source object to bring it up to date with the schema version
 * of this migration.
 */
export interface SchemaMigration {
  /**
   * The resulting schema version after the migration.
   */
  readonly version: number;

  /**
   * The versions this migration accepts as input: `from` inclusive, `to` exclusive.
   */
  readonly range: {from: number; to: number};

  /**
   * Migrates the given source object to match the new schema. The source is a private copy and may be modified.
   *
   * @param source - the copy of the source object to migrate.
   * @returns a promise which resolves to the migrated object.
   */
  migrate(source: Record<string, unknown>): Promise<Record<string, unknown>>;
}
