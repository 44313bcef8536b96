// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';

/**
 * This file should only contain the function to get the deploynet version.
 */
export function getDeployNetVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // the compiled entrypoint lives in dist/, the sources beside package.json
  for (const candidate of [path.resolve(__dirname, 'package.json'), path.resolve(__dirname, '..', 'package.json')]) {
    if (fs.existsSync(candidate)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
        return `${packageJson.version}`;
      }
    }
  }

  return '0.0.0';
}
