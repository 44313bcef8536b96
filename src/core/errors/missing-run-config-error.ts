// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from './configuration-error.js';

export class MissingRunConfigError extends ConfigurationError {
  public constructor(team: string, kind: string, searched: string[], cause?: unknown) {
    super(`no usable ${kind} run config for team '${team}' (looked in: ${searched.join(', ')})`, cause, {
      team,
      kind,
      searched,
    });
  }
}
