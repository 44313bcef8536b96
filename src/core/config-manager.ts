// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {MissingArgumentError} from './errors/missing-argument-error.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {type NetLogger} from './logging/net-logger.js';
import {Flags as flags} from '../commands/flags.js';
import {type CommandFlag} from '../types/flag-types.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct} from '../types/aliases.js';
import {getDeployNetVersion} from '../../version.js';

export type FlagValue = string | number | boolean;

export interface CachedConfig {
  flags: Record<string, FlagValue>;
  version: string;
  updatedAt: string;
  lastCommand?: string[];
}

/**
 * ConfigManager caches command flag values so that a value given once (for example the cloud project) applies to the
 * remaining stages of the same invocation, while a flag given explicitly to a command always wins.
 */
@injectable()
export class ConfigManager {
  public config: CachedConfig = ConfigManager.emptyConfig();

  public constructor(@inject(InjectTokens.NetLogger) private readonly logger: NetLogger) {
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
  }

  /** Reset config */
  public reset(): void {
    this.config = ConfigManager.emptyConfig();
  }

  private static emptyConfig(): CachedConfig {
    return {
      flags: {},
      version: getDeployNetVersion(),
      updatedAt: new Date().toISOString(),
    };
  }

  /**
   * Apply the command flags precedence
   *
   * It uses the below precedence for command flag values:
   *  1. User input of the command flag
   *  2. Cached value of the flag
   *  3. Default value of the command flag
   */
  public applyPrecedence(argv: ArgvStruct): ArgvStruct {
    for (const flag of flags.allFlags) {
      if (argv[flag.name] !== undefined) {
        // argv takes precedence, nothing to do
      } else if (this.hasFlag(flag)) {
        argv[flag.name] = this.getFlag(flag);
      } else {
        argv[flag.name] = flag.definition.defaultValue;
      }
    }

    return argv;
  }

  /** Update the config using the argv */
  public update(argv: ArgvStruct): void {
    if (!argv || Object.keys(argv).length === 0) {
      return;
    }

    for (const flag of flags.allFlags) {
      const value: unknown = argv[flag.name];
      if (value === undefined) {
        continue;
      }

      this.config.flags[flag.name] = ConfigManager.coerce(flag, value);
    }

    // store last command that was run
    if (argv._) {
      this.config.lastCommand = argv._.map(String);
    }

    this.config.updatedAt = new Date().toISOString();

    const flagMessage = Object.entries(this.config.flags)
      .map(([key, value]) => `${key}=${flags.allFlagsMap.get(key)?.definition.dataMask ?? value}`)
      .join(', ');

    if (flagMessage) {
      this.logger.debug(`Updated config with flags: ${flagMessage}`);
    }
  }

  private static coerce(flag: CommandFlag, value: unknown): FlagValue {
    switch (flag.definition.type) {
      case 'string': {
        const text = `${value}`; // force convert to string
        if (flag.definition.choices && text !== '' && !flag.definition.choices.includes(text)) {
          throw new IllegalArgumentError(
            `invalid value '${text}' for --${flag.name}, expected one of: ${flag.definition.choices.join(', ')}`,
            text,
          );
        }
        return text;
      }

      case 'number': {
        const number_ = typeof value === 'number' ? value : Number.parseInt(`${value}`, 10);
        if (!Number.isFinite(number_)) {
          throw new IllegalArgumentError(`invalid number value '${value}' for --${flag.name}`, value);
        }
        return number_;
      }

      case 'boolean': {
        return value === true || value === 'true'; // use comparison to enforce boolean value
      }
    }
  }

  /** Check if a flag value is set */
  public hasFlag(flag: CommandFlag): boolean {
    return this.config.flags[flag.name] !== undefined;
  }

  /**
   * Return the value of the given flag
   * @returns value of the flag or undefined if flag value is not available
   */
  public getFlag(flag: CommandFlag): FlagValue | undefined {
    return this.config.flags[flag.name];
  }

  /** Returns a string flag, falling back to its default; empty strings count as unset */
  public getString(flag: CommandFlag): string | undefined {
    const value = this.getFlag(flag) ?? flag.definition.defaultValue;
    return value === undefined || value === '' ? undefined : `${value}`;
  }

  /** Returns a string flag or throws MissingArgumentError when it has no value */
  public getRequiredString(flag: CommandFlag): string {
    const value = this.getString(flag);
    if (value === undefined) {
      throw new MissingArgumentError(`--${flag.name} is required`);
    }
    return value;
  }

  public getNumber(flag: CommandFlag): number {
    const value = this.getFlag(flag) ?? flag.definition.defaultValue;
    return typeof value === 'number' ? value : 0;
  }

  public getBoolean(flag: CommandFlag): boolean {
    const value = this.getFlag(flag) ?? flag.definition.defaultValue;
    return value === true;
  }

  /** Set value for the flag */
  public setFlag(flag: CommandFlag, value: FlagValue): void {
    if (!flag || !flag.name) {
      throw new MissingArgumentError('flag must have a name');
    }
    this.config.flags[flag.name] = value;
  }

  /** Get package version */
  public getVersion(): string {
    return this.config.version;
  }
}
