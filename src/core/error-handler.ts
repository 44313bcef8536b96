// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type NetLogger} from './logging/net-logger.js';
import {UserBreak} from './errors/user-break.js';
import {StageFailureError} from './errors/stage-failure-error.js';

@injectable()
export class ErrorHandler {
  public constructor(@inject(InjectTokens.NetLogger) private readonly logger: NetLogger) {
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
  }

  /**
   * Reports the error to the user and sets the process exit code for anything that is not a break.
   */
  public handle(error: unknown): void {
    const error_ = this.extractBreak(error);
    const stageFailure = this.extractStageFailure(error);
    if (error_ instanceof UserBreak) {
      this.handleUserBreak(error_);
    } else if (stageFailure) {
      this.handleStageFailure(stageFailure);
    } else {
      this.handleError(error);
    }
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.showUser(userBreak.message);
  }

  // the outcome table has already been printed by the command
  private handleStageFailure(error: StageFailureError): void {
    this.logger.error(error.message, {failed: error.failed});
    process.exitCode = 1;
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
    process.exitCode = 1;
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak
   * Returns the UserBreak if found, otherwise false
   */
  private extractBreak(error: unknown): UserBreak | false {
    if (error instanceof UserBreak) {
      return error;
    }
    if (error instanceof Error && error.cause) {
      return this.extractBreak(error.cause);
    }
    return false;
  }

  private extractStageFailure(error: unknown): StageFailureError | undefined {
    if (error instanceof StageFailureError) {
      return error;
    }
    if (error instanceof Error && error.cause) {
      return this.extractStageFailure(error.cause);
    }
    return undefined;
  }
}
