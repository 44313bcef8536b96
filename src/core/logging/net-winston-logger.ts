// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {PathEx} from '../util/path-ex.js';
import {type LogContext, type NetLogger} from './net-logger.js';
import {ScopedLogger} from './scoped-logger.js';

interface LogLine {
  timestamp?: unknown;
  level: string;
  message: unknown;
  traceId?: unknown;
  node?: unknown;
  stage?: unknown;
}

function field(value: unknown): string {
  return typeof value === 'string' && value !== '' ? value : '-';
}

/** TIMESTAMP|LEVEL|TRACE|NODE|STAGE| MESSAGE, with `-` for a field the entry does not carry */
export function formatLogLine(data: LogLine): string {
  return [field(data.timestamp), data.level, field(data.traceId), field(data.node), field(data.stage)]
    .join('|')
    .concat(`| ${String(data.message)}`);
}

const lineFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  winston.format.printf(data => formatLogLine(data)),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

interface ErrorFrame {
  message: string;
  stacktrace: string;
}

@injectable()
export class NetWinstonLogger implements NetLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - directory receiving deploynet.log
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel: string,
    @inject(InjectTokens.DevelopmentMode) private developmentMode: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory: string,
  ) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    logsDirectory = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      format: lineFormat,
      transports: [new winston.transports.File({filename: PathEx.join(logsDirectory, 'deploynet.log')})],
    });
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public withContext(context: LogContext): NetLogger {
    return new ScopedLogger(this, context);
  }

  public showUser(message: string, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown): void {
    const stack: ErrorFrame[] = NetWinstonLogger.unwindCauses(error);
    const message: string = stack[0].message;

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix = '';
      let indent = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        // Remove everything after the first "Caused by: " and add indentation
        const formattedStacktrace = s.stacktrace
          .replace(/Caused by:.*/s, '')
          .replaceAll(/\n\s*/g, '\n' + indent)
          .trim();
        console.log(indent + chalk.gray(formattedStacktrace) + '\n');
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.error(message, error);
  }

  public error(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.error(message, ...arguments_, this.prepMeta());
  }

  public warn(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(message, ...arguments_, this.prepMeta());
  }

  public info(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.info(message, ...arguments_, this.prepMeta());
  }

  public debug(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(message, ...arguments_, this.prepMeta());
  }

  public showJSON(title: string, object: object): void {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green('-------------------------------------------------------------------------------'));
    console.log(JSON.stringify(object, null, ' '));
  }

  private static unwindCauses(error: unknown): ErrorFrame[] {
    if (!(error instanceof Error)) {
      return [{message: String(error), stacktrace: ''}];
    }

    const stack: ErrorFrame[] = [{message: error.message, stacktrace: error.stack ?? ''}];
    let depth = 0;
    let cause: unknown = error.cause;
    while (cause instanceof Error && depth < 10) {
      if (cause.stack) {
        stack.push({message: cause.message, stacktrace: cause.stack});
      }

      cause = cause.cause;
      depth += 1;
    }

    return stack;
  }
}
