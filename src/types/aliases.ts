// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';

export type IP = string;

export type NodeName = string;

export type Yargs = Argv;

export type ArgvStruct = {_: (string | number)[]} & Record<string, unknown>;
