// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export class PathEx {
  /**
   * Securely joins paths while preventing path traversal. Requires that the base directory and the joined path are
   * real and exist.
   *
   * @param baseDirectory - The base directory to enforce
   * @param paths - The paths to join
   * @throws IllegalArgumentError if the resolved path is outside the base directory.
   */
  public static safeJoinWithBaseDirConfinement(baseDirectory: string, ...paths: string[]): string {
    const resolvedBase: string = fs.realpathSync(baseDirectory);
    const resolvedPath: string = fs.realpathSync(path.resolve(resolvedBase, ...paths));

    if (!resolvedPath.startsWith(resolvedBase + path.sep)) {
      throw new IllegalArgumentError(`Path traversal detected: ${resolvedPath} is outside ${resolvedBase}`, paths);
    }

    return resolvedPath;
  }

  /**
   * Joins the given paths. This is a wrapper around path.join. Only use this with literals or values which have been
   * validated, otherwise use `PathEx.safeJoinWithBaseDirConfinement(...)`.
   */
  public static join(...paths: string[]): string {
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given paths, expanding a leading `~` to the user's home directory.
   */
  public static resolve(...paths: string[]): string {
    const [first, ...rest] = paths;
    if (first !== undefined && (first === '~' || first.startsWith('~/'))) {
      return path.resolve(os.homedir(), first.slice(2), ...rest);
    }

    return path.resolve(...paths);
  }
}
