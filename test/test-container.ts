// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {Container} from '../src/core/dependency-injection/container-init.js';
import {type ClaimctlLogger} from '../src/core/logging/claimctl-logger.js';
import {PathEx} from '../src/business/utils/path-ex.js';

const CACHE_DIRECTORY = PathEx.join('test', 'data', 'tmp');

export function resetTestContainer(homeDirectory: string = CACHE_DIRECTORY, testLogger?: ClaimctlLogger): void {
  // For the test suites the temporary test directory doubles as the claimctl home directory
  Container.getInstance().reset(homeDirectory, 'debug', true, testLogger);
}

export function resetForTest(homeDirectory: string = CACHE_DIRECTORY, testLogger?: ClaimctlLogger): void {
  if (!fs.existsSync(homeDirectory)) {
    fs.mkdirSync(homeDirectory, {recursive: true});
  }
  // need to init the container prior to resolving any injectable class
  resetTestContainer(homeDirectory, testLogger);
}
