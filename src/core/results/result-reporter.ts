// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type NetLogger} from '../logging/net-logger.js';
import {type NodeResult, NodeResults, ResultStatus} from './node-result.js';
import {StageFailureError} from '../errors/stage-failure-error.js';

const HEADER: readonly string[] = ['TARGET', 'STAGE', 'STATUS', 'REASON'];

@injectable()
export class ResultReporter {
  public constructor(@inject(InjectTokens.NetLogger) private readonly logger: NetLogger) {
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
  }

  /**
   * Lays the results out as a table, one row per result in the given order, columns padded to their widest cell.
   */
  public render(results: readonly NodeResult[]): string[] {
    const rows: string[][] = [
      [...HEADER],
      ...results.map(result => [
        result.target,
        result.stage,
        result.status,
        result.errorKind ? `${result.errorKind}: ${result.reason}` : result.reason,
      ]),
    ];

    const widths = HEADER.map((_, column) => Math.max(...rows.map(row => row[column].length)));
    return rows.map(row =>
      row
        .map((cell, column) => (column === row.length - 1 ? cell : cell.padEnd(widths[column])))
        .join('  ')
        .trimEnd(),
    );
  }

  /**
   * Prints the outcome table and throws StageFailureError when any result failed.
   */
  public report(title: string, results: readonly NodeResult[]): void {
    const lines = this.render(results);
    this.logger.showUser(chalk.green(`\n *** ${title} ***`));
    this.logger.showUser(chalk.bold(lines[0]));
    for (const [index, result] of results.entries()) {
      const line = lines[index + 1];
      this.logger.showUser(result.status === ResultStatus.Ok ? chalk.green(line) : chalk.red(line));
    }

    const failures = NodeResults.failures(results);
    if (failures.length > 0) {
      throw new StageFailureError(title, [...new Set(failures.map(failure => failure.target))]);
    }
  }
}
