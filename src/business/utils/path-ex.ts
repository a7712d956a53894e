// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

export class PathEx {
  /**
   * Joins the given paths. This is a wrapper around path.join. It is recommended to only use this when you are dealing
   * with part of a path that is not a complete path reference on its own.
   *
   * @param paths
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given paths. This is a wrapper around path.resolve. Chart metadata paths are supplied relative to the
   * repository directory given on the command line and are resolved against it with this method.
   *
   * @param paths
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }

  public static dirname(filePath: string): string {
    return path.dirname(filePath);
  }
}
