// SPDX-License-Identifier: Apache-2.0

import {type LogContext, type NetLogger} from './net-logger.js';

/**
 * Forwards to a parent logger, appending the node and stage as metadata of every log entry. Console output is left
 * untouched.
 */
export class ScopedLogger implements NetLogger {
  public constructor(
    private readonly parent: NetLogger,
    public readonly context: LogContext,
  ) {}

  public setDevMode(developmentMode: boolean): void {
    this.parent.setDevMode(developmentMode);
  }

  public nextTraceId(): void {
    this.parent.nextTraceId();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    return this.parent.prepMeta({...this.context, ...meta});
  }

  public withContext(context: LogContext): NetLogger {
    return new ScopedLogger(this.parent, {...this.context, ...context});
  }

  public showUser(message: string, ...arguments_: unknown[]): void {
    this.parent.showUser(message, ...arguments_);
  }

  public showUserError(error: unknown): void {
    this.parent.showUserError(error);
  }

  public error(message: string, ...arguments_: unknown[]): void {
    this.parent.error(message, ...arguments_, this.context);
  }

  public warn(message: string, ...arguments_: unknown[]): void {
    this.parent.warn(message, ...arguments_, this.context);
  }

  public info(message: string, ...arguments_: unknown[]): void {
    this.parent.info(message, ...arguments_, this.context);
  }

  public debug(message: string, ...arguments_: unknown[]): void {
    this.parent.debug(message, ...arguments_, this.context);
  }

  public showJSON(title: string, object: object): void {
    this.parent.showJSON(title, object);
  }
}
