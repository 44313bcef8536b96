// SPDX-License-Identifier: Apache-2.0

import {type ClassConstructor} from 'class-transformer';
import {type SchemaMigration} from './schema-migration.js';

/**
 * Defines a schema which can be used to convert input data into a model instance.
 */
export interface Schema<T> {
  /**
   * The name of the schema, related to the model it represents.
   */
  readonly name: string;

  /**
   * The current version of the schema. This is used to determine if the input data needs to be migrated before being
   * applied to a model.
   */
  readonly version: number;

  /**
   * The class constructor for the model. This is used to create instances of the model from the input data.
   */
  readonly classCtor: ClassConstructor<T>;

  /**
   * The list of migrations which can be applied to the model data, in any order.
   */
  readonly migrations: SchemaMigration[];

  /**
   * Reads the version a plain document was written with.
   */
  versionOf(data: Record<string, unknown>): number;

  /**
   * Transforms the plain javascript object into an instance of the model class. Applies any necessary migrations to the
   * input data before creating the model instance. Documents newer than the schema are mapped as they are.
   *
   * @param data - The plain javascript object to be transformed.
   * @returns an instance of the model class.
   */
  transform(data: Record<string, unknown>): Promise<T>;

  /**
   * Validates that the migrations form an unbroken sequence from version 0 to the current version, so that a document
   * is never left partially migrated.
   */
  validateMigrations(): void;
}
