/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './memory/index.js';
export { debugLogger } from './utils/debugLogger.js';
