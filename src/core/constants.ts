// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- chart updater related constants -------------------------------------------------------------
export const SCRIPT_NAME = 'update-helm-chart';
export const ERROR_PREFIX = '[update_helm_chart]';
export const CHART_UPDATER_HOME_DIR = process.env.CHART_UPDATER_HOME || PathEx.join(os.homedir(), '.chart-updater');
export const CHART_UPDATER_LOGS_DIR = PathEx.join(CHART_UPDATER_HOME_DIR, 'logs');
export const CHART_UPDATER_LOG_FILE = 'chart-updater.log';
export const CHART_UPDATER_LOG_LEVEL = process.env.CHART_UPDATER_LOG_LEVEL || 'debug';

// --------------- GitHub Actions related constants --------------------------------------------------------------------
export const GITHUB_OUTPUT_FILE = process.env.GITHUB_OUTPUT || '';

// --------------- Chart metadata related constants --------------------------------------------------------------------
export const CHART_VERSION_KEY = 'version';
export const CHART_APP_VERSION_KEY = 'appVersion';
export const BRANCH_NAME_PREFIX = 'update';
export const DEFAULT_BRANCH_SLUG = 'app';
export const FALLBACK_BRANCH_VERSION = 'latest';
