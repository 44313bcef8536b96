// SPDX-License-Identifier: Apache-2.0

import {type NodeName} from '../../types/aliases.js';

/** Fields stamped on every entry of a scoped logger */
export interface LogContext {
  node?: NodeName;
  stage?: string;
}

export interface NetLogger {
  setDevMode(developmentMode: boolean): void;

  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  /** Returns a logger that tags every entry with the given node and stage, on top of its own context */
  withContext(context: LogContext): NetLogger;

  showUser(message: string, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  error(message: string, ...arguments_: unknown[]): void;

  warn(message: string, ...arguments_: unknown[]): void;

  info(message: string, ...arguments_: unknown[]): void;

  debug(message: string, ...arguments_: unknown[]): void;

  showJSON(title: string, object: object): void;
}
