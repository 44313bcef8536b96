// SPDX-License-Identifier: Apache-2.0

import {PeerAddressFormat} from './peer-address-format.js';
import {type NodeSpec} from '../metadata/node-spec.js';
import {transportPorts, withHost, withPeerId} from '../metadata/multiaddr.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {type IP} from '../../types/aliases.js';

/** Writes one peer entry of `peer_addrs` / `bootstrap_addrs` */
export interface PeerAddressPolicy {
  readonly format: PeerAddressFormat;

  address(peer: NodeSpec, ip: IP): string;
}

class MultiaddrPolicy implements PeerAddressPolicy {
  public readonly format = PeerAddressFormat.Multiaddr;

  public address(peer: NodeSpec, ip: IP): string {
    return withPeerId(withHost(peer.listenAddresses[0], ip), peer.peerId);
  }
}

class IpPolicy implements PeerAddressPolicy {
  public readonly format = PeerAddressFormat.Ip;

  public address(_peer: NodeSpec, ip: IP): string {
    return ip;
  }
}

class IpPortPolicy implements PeerAddressPolicy {
  public readonly format = PeerAddressFormat.IpPort;

  public address(peer: NodeSpec, ip: IP): string {
    for (const listenAddress of peer.listenAddresses) {
      const [first] = transportPorts(listenAddress);
      if (first) {
        return `${ip}:${first.port}`;
      }
    }
    throw new ConfigurationError(`node '${peer.nodeName}' has no listen address with a tcp or udp port`);
  }
}

export class PeerAddressPolicies {
  private static readonly policies: ReadonlyMap<PeerAddressFormat, PeerAddressPolicy> = new Map<
    PeerAddressFormat,
    PeerAddressPolicy
  >([
    [PeerAddressFormat.Multiaddr, new MultiaddrPolicy()],
    [PeerAddressFormat.Ip, new IpPolicy()],
    [PeerAddressFormat.IpPort, new IpPortPolicy()],
  ]);

  private constructor() {}

  public static of(format: PeerAddressFormat): PeerAddressPolicy {
    const policy = PeerAddressPolicies.policies.get(format);
    if (!policy) {
      throw new ConfigurationError(`unknown peer address format: ${format}`);
    }
    return policy;
  }
}
