// SPDX-License-Identifier: Apache-2.0

export type FlagType = 'string' | 'number' | 'boolean';

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string | number;
  alias?: string;
  type: FlagType;
  choices?: string[];
  dataMask?: string;
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}
