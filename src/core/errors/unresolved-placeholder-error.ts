// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from './configuration-error.js';

export class UnresolvedPlaceholderError extends ConfigurationError {
  /**
   * @param placeholder - the name between the braces that has no value
   * @param template - the template string the placeholder was found in
   */
  public constructor(
    public readonly placeholder: string,
    public readonly template: string,
  ) {
    super(`unresolved placeholder '{{${placeholder}}}' in command argument: ${template}`, undefined, {
      placeholder,
      template,
    });
  }
}
