// SPDX-License-Identifier: Apache-2.0

import {Container} from '../src/core/dependency-injection/container-init.js';
import {type NetLogger} from '../src/core/logging/net-logger.js';
import {PathEx} from '../src/core/util/path-ex.js';
import {RecordingLogger} from './test-utility.js';

const HOME_DIRECTORY = PathEx.join('test', 'data', 'tmp');

export function resetTestContainer(
  homeDirectory: string = HOME_DIRECTORY,
  testLogger: NetLogger = new RecordingLogger(),
): void {
  Container.getInstance().reset(homeDirectory, 'debug', true, testLogger);
}

export function resetForTest(homeDirectory: string = HOME_DIRECTORY, testLogger?: NetLogger): void {
  // the container must be initialized before any injected class is constructed
  resetTestContainer(homeDirectory, testLogger);
}
