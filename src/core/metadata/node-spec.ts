// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsEnum, IsNotEmpty, IsString, Matches, MaxLength, validateSync} from 'class-validator';
import {NodeKind} from './node-kind.js';
import {IsMultiaddrList} from '../validator-decorators.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {describeValidationErrors} from '../util/validation-helpers.js';
import {type Validate} from '../../types/index.js';

export const NODE_NAME_PATTERN = /^[a-z]([-a-z0-9]*[a-z0-9])?$/;
export const ADDRESS_PATTERN = /^0x[0-9a-fA-F]+$/;
export const TEAM_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * A single node of the desired network. Loaded once per run and never mutated afterwards.
 */
@Exclude()
export class NodeSpec implements Validate {
  @Expose()
  @IsString()
  @Matches(TEAM_PATTERN, {message: 'team must be a plain directory name'})
  public team: string;

  @Expose({name: 'node_name'})
  @IsString()
  @MaxLength(63)
  @Matches(NODE_NAME_PATTERN, {message: 'node_name must be a DNS label (lowercase letters, digits and dashes)'})
  public nodeName: string;

  @Expose()
  @IsString()
  @Matches(ADDRESS_PATTERN, {message: 'address must be a 0x prefixed hex string'})
  public address: string;

  @Expose({name: 'peer_id'})
  @IsString()
  @IsNotEmpty()
  public peerId: string;

  @Expose({name: 'listen_addresses'})
  @IsMultiaddrList()
  public listenAddresses: string[];

  @Expose()
  @IsEnum(NodeKind)
  public kind: NodeKind;

  public constructor(
    team?: string,
    nodeName?: string,
    address?: string,
    peerId?: string,
    listenAddresses?: string[],
    kind?: NodeKind,
  ) {
    this.team = team ?? '';
    this.nodeName = nodeName ?? '';
    this.address = address ?? '';
    this.peerId = peerId ?? '';
    this.listenAddresses = listenAddresses ?? [];
    this.kind = kind ?? NodeKind.Validator;
  }

  public get isBoot(): boolean {
    return this.kind === NodeKind.Boot;
  }

  public validate(): void {
    const violations = describeValidationErrors(validateSync(this));
    if (violations.length > 0) {
      throw new ConfigurationError(`invalid node '${this.nodeName || '<unnamed>'}': ${violations.join('; ')}`, undefined, {
        node: this.nodeName,
        violations,
      });
    }
  }
}
