// SPDX-License-Identifier: Apache-2.0

import {ProcessOutput} from 'listr2';
import * as util from 'node:util';
import {type NetLogger} from './net-logger.js';

export const TASKS_LOG_STAGE = 'tasks';

/** Mirrors Listr2 task output into the log file, one entry per non-blank line, under the `tasks` stage */
export class TaskOutput extends ProcessOutput {
  private readonly log: NetLogger;

  public constructor(logger: NetLogger) {
    super();
    this.log = logger.withContext({stage: TASKS_LOG_STAGE});
  }

  public override toStdout(chunk: string, eol = true): boolean {
    for (const line of TaskOutput.lines(chunk)) {
      this.log.debug(line);
    }
    return super.toStdout(chunk, eol);
  }

  public override toStderr(chunk: string, eol = true): boolean {
    for (const line of TaskOutput.lines(chunk)) {
      this.log.error(line);
    }
    return super.toStderr(chunk, eol);
  }

  private static lines(chunk: string): string[] {
    return util
      .stripVTControlCharacters(chunk.toString())
      .split('\n')
      .map(line => line.trimEnd())
      .filter(line => line.trim() !== '');
  }
}
