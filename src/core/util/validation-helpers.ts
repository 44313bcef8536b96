// SPDX-License-Identifier: Apache-2.0

import {type ValidationError} from 'class-validator';

export function isValidEnum<E extends Record<string, string>>(value: unknown, enumeration: E): value is E[keyof E] {
  return Object.values(enumeration).some(candidate => candidate === value);
}

/**
 * Flattens class-validator results, nested children included, into `property: message` lines.
 */
export function describeValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  const lines: string[] = [];
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints ?? {})) {
      lines.push(`${path}: ${message}`);
    }
    if (error.children && error.children.length > 0) {
      lines.push(...describeValidationErrors(error.children, path));
    }
  }
  return lines;
}
