// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export type TransportProtocol = 'tcp' | 'udp';

export interface TransportPort {
  protocol: TransportProtocol;
  port: number;
}

const HOST_PROTOCOLS = new Set(['ip4', 'ip6', 'dns', 'dns4', 'dns6', 'dnsaddr']);

function components(address: string): string[] {
  if (!address.startsWith('/')) {
    throw new IllegalArgumentError(`multiaddr must start with '/': ${address}`, address);
  }
  return address.split('/').slice(1);
}

/**
 * Returns every `/tcp/<port>` and `/udp/<port>` pair of a multiaddr, in order.
 */
export function transportPorts(address: string): TransportPort[] {
  const parts = components(address);
  const ports: TransportPort[] = [];
  for (let index = 0; index < parts.length - 1; index++) {
    const protocol = parts[index];
    if (protocol !== 'tcp' && protocol !== 'udp') {
      continue;
    }

    const port = Number.parseInt(parts[index + 1], 10);
    if (Number.isInteger(port) && port > 0 && port <= 65_535 && `${port}` === parts[index + 1]) {
      ports.push({protocol, port});
    }
    index++;
  }
  return ports;
}

/**
 * Replaces the value of the host component (`ip4`, `ip6` or a `dns` variant) with the given IPv4 address. An address
 * without a host component gets one prepended.
 */
export function withHost(address: string, ip: string): string {
  const parts = components(address);
  const hostIndex = parts.findIndex(part => HOST_PROTOCOLS.has(part));
  if (hostIndex === -1 || hostIndex + 1 >= parts.length) {
    return `/ip4/${ip}${address}`;
  }

  const rewritten = [...parts];
  rewritten[hostIndex] = 'ip4';
  rewritten[hostIndex + 1] = ip;
  return '/' + rewritten.join('/');
}

/** Appends `/p2p/<peerId>` unless the address already names a peer */
export function withPeerId(address: string, peerId: string): string {
  return /\/(p2p|ipfs)\//.test(address) ? address : `${address}/p2p/${peerId}`;
}
