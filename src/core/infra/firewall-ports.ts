// SPDX-License-Identifier: Apache-2.0

import {type NodeSpec} from '../metadata/node-spec.js';
import {type TransportPort, transportPorts} from '../metadata/multiaddr.js';

function portKey(port: TransportPort): string {
  return `${port.protocol}/${port.port}`;
}

/**
 * Union of the transport ports named by the nodes' listen addresses, sorted by protocol then port.
 */
export function desiredP2pPorts(nodes: readonly NodeSpec[]): TransportPort[] {
  const ports = new Map<string, TransportPort>();
  for (const node of nodes) {
    for (const address of node.listenAddresses) {
      for (const port of transportPorts(address)) {
        ports.set(portKey(port), port);
      }
    }
  }

  return [...ports.values()].sort((l, r) => l.protocol.localeCompare(r.protocol) || l.port - r.port);
}

/** Ports of `wanted` missing from `existing` */
export function missingPorts(existing: readonly TransportPort[], wanted: readonly TransportPort[]): TransportPort[] {
  const present = new Set(existing.map(portKey));
  return wanted.filter(port => !present.has(portKey(port)));
}

/** Union of both lists, order of first appearance, no duplicates */
export function mergePorts(existing: readonly TransportPort[], added: readonly TransportPort[]): TransportPort[] {
  const merged = new Map<string, TransportPort>();
  for (const port of [...existing, ...added]) {
    merged.set(portKey(port), port);
  }
  return [...merged.values()];
}
