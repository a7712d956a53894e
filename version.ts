// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * Version of the chart updater, taken from npm when run through a package script, else from package.json next to
 * the sources or one level above the compiled output.
 */
export function getToolVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const currentDirectory: string = PathEx.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [
    PathEx.join(currentDirectory, 'package.json'),
    PathEx.join(currentDirectory, '..', 'package.json'),
  ]) {
    if (fs.existsSync(candidate)) {
      const packageJson: {version?: unknown} = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (typeof packageJson.version === 'string') {
        return packageJson.version;
      }
    }
  }

  return '0.0.0';
}
