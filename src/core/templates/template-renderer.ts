// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {UnresolvedPlaceholderError} from '../errors/unresolved-placeholder-error.js';

export type TemplateVariables = Readonly<Record<string, string>>;

const TOKEN = /\{\{(.*?)\}\}/g;
const NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Substitutes `{{name}}` tokens in command arguments. Substitution is a single pass: values are inserted verbatim and
 * never expanded again.
 */
@injectable()
export class TemplateRenderer {
  /**
   * Renders every template, one output per input and in the same order. Nothing is rendered unless every placeholder
   * of the batch resolves.
   *
   * @param templates - command arguments, possibly containing placeholders
   * @param variables - values by placeholder name; lists must already be joined
   * @param allowed - when given, names outside this set are unresolved even if `variables` has them
   * @throws UnresolvedPlaceholderError for the first placeholder that does not resolve, is not a plain identifier, or
   * leaves an unpaired `{{` or `}}` behind
   */
  public render(templates: readonly string[], variables: TemplateVariables, allowed?: ReadonlySet<string>): string[] {
    for (const template of templates) {
      for (const name of this.placeholdersOf(template)) {
        if (!NAME.test(name) || !Object.hasOwn(variables, name) || (allowed !== undefined && !allowed.has(name))) {
          throw new UnresolvedPlaceholderError(name, template);
        }
      }

      const stray = TemplateRenderer.strayMarker(template);
      if (stray !== undefined) {
        throw new UnresolvedPlaceholderError(stray, template);
      }
    }

    return templates.map(template => template.replaceAll(TOKEN, (_match, name: string) => variables[name.trim()]));
  }

  /** Trimmed contents of every `{{...}}` token of a template, in order of appearance */
  public placeholdersOf(template: string): string[] {
    return [...template.matchAll(TOKEN)].map(match => match[1].trim());
  }

  /** Text next to a `{{` or `}}` that is not part of a complete token */
  private static strayMarker(template: string): string | undefined {
    const leftover = template.replaceAll(TOKEN, '');
    const opening = leftover.indexOf('{{');
    if (opening !== -1) {
      return leftover.slice(opening + 2).trim();
    }

    const closing = leftover.indexOf('}}');
    return closing === -1 ? undefined : leftover.slice(0, closing).trim();
  }
}
