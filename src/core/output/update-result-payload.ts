// SPDX-License-Identifier: Apache-2.0

export interface ParentChartUpdate {
  path: string;
  old_version: string;
  new_version: string;
}

/**
 * The JSON document describing an update run, keyed the way the calling workflow reads it
 */
export interface UpdateResultPayload {
  old_app_version: string;
  new_app_version: string;
  old_chart_version: string;
  new_chart_version: string;
  release_type: string;
  chart_modified: boolean;
  parent_chart_update: ParentChartUpdate | null;
  branch_name: string;
  has_changes: boolean;
}

export type OutputValue = string | boolean | object | null | undefined;
