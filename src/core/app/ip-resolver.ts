// SPDX-License-Identifier: Apache-2.0

import {type DeployedStateStore} from '../state/deployed-state-store.js';
import {type NodeSpec} from '../metadata/node-spec.js';
import {type NetLogger} from '../logging/net-logger.js';
import {DeploymentError} from '../errors/deployment-error.js';
import {DeployNetError} from '../errors/deploy-net-error.js';
import {type IP, type NodeName} from '../../types/aliases.js';

export type LiveIpLookup = (nodeName: NodeName) => Promise<IP | undefined>;

/**
 * Resolves public IPs from the state store, falling back to one live lookup per node. A looked up IP is written back to
 * the store when the store accepts it; concurrent callers share the pending lookup.
 */
export class IpResolver {
  private readonly pending = new Map<NodeName, Promise<IP>>();

  public constructor(
    private readonly store: DeployedStateStore,
    private readonly lookup: LiveIpLookup,
    private readonly logger: NetLogger,
  ) {}

  public async resolve(node: NodeSpec): Promise<IP> {
    const cached = this.store.getIp(node.nodeName);
    if (cached) {
      return cached;
    }

    let pending = this.pending.get(node.nodeName);
    if (!pending) {
      pending = this.lookupAndCache(node);
      this.pending.set(node.nodeName, pending);
    }
    return pending;
  }

  private async lookupAndCache(node: NodeSpec): Promise<IP> {
    this.logger.debug(`No cached IP for ${node.nodeName}, asking the cloud provider`);
    const ip = await this.lookup(node.nodeName);
    if (!ip) {
      throw new DeploymentError(`no public IP known for '${node.nodeName}'; run the infra stage first`, undefined, {
        node: node.nodeName,
      });
    }

    try {
      await this.store.upsert(node.nodeName, {team: node.team, address: node.address, peerId: node.peerId, ip});
    } catch (error) {
      this.logger.warn(`Could not cache the IP of ${node.nodeName}: ${DeployNetError.messageOf(error)}`);
    }
    return ip;
  }
}
