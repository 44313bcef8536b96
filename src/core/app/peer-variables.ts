// SPDX-License-Identifier: Apache-2.0

import {type NodeSpec} from '../metadata/node-spec.js';
import {type DesiredState} from '../metadata/desired-state.js';
import {type RunConfig} from '../metadata/run-config.js';
import {type PeerAddressPolicy} from './peer-address-policy.js';
import {type TemplateVariables} from '../templates/template-renderer.js';
import {toCsv} from '../helpers.js';
import {type IP} from '../../types/aliases.js';

export type IpOf = (node: NodeSpec) => Promise<IP>;

/**
 * Peers a node bootstraps from: the other boot nodes, or the other validators when there is no other boot node.
 * Never includes the node itself.
 */
export function peersOf(node: NodeSpec, desired: DesiredState): NodeSpec[] {
  const others = (nodes: NodeSpec[]): NodeSpec[] => nodes.filter(peer => peer.nodeName !== node.nodeName);
  const bootPeers = others(desired.bootNodes);
  return bootPeers.length > 0 ? bootPeers : others(desired.validators);
}

/**
 * Builds the template variables of one node. `validator_addrs` is only set for validators, so a boot node template
 * naming it fails to render.
 */
export async function nodeVariables(
  node: NodeSpec,
  desired: DesiredState,
  runConfig: RunConfig,
  network: string,
  policy: PeerAddressPolicy,
  ipOf: IpOf,
): Promise<TemplateVariables> {
  const peerAddresses: string[] = [];
  for (const peer of peersOf(node, desired)) {
    peerAddresses.push(policy.address(peer, await ipOf(peer)));
  }
  const peers = toCsv(peerAddresses);

  const variables: Record<string, string> = {
    address: node.address,
    node_name: node.nodeName,
    peer_id: node.peerId,
    team: node.team,
    listen_addresses: toCsv(node.listenAddresses),
    peer_addrs: peers,
    bootstrap_addrs: peers,
    network,
    image: runConfig.image,
    data_dir: runConfig.dataDir,
    p2p_identity_path: runConfig.p2pIdentityPath,
  };

  if (!node.isBoot) {
    variables.validator_addrs = toCsv(
      desired.validators.filter(peer => peer.nodeName !== node.nodeName).map(peer => peer.address),
    );
  }
  return variables;
}
