// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

/**
 * One cached row of the deployed state. Identity fields are copied from the node's metadata; `ip` is the public IP
 * observed by the infra stage.
 */
@Exclude()
export class DeployedNode {
  @Expose({name: 'node_name'})
  public nodeName: string;

  @Expose()
  public team: string;

  @Expose()
  public address: string;

  @Expose({name: 'peer_id'})
  public peerId: string;

  @Expose()
  public ip: string;

  public constructor(nodeName?: string, team?: string, address?: string, peerId?: string, ip?: string) {
    this.nodeName = nodeName ?? '';
    this.team = team ?? '';
    this.address = address ?? '';
    this.peerId = peerId ?? '';
    this.ip = ip ?? '';
  }
}

export type DeployedNodeFields = Partial<Pick<DeployedNode, 'team' | 'address' | 'peerId' | 'ip'>>;
