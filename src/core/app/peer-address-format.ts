// SPDX-License-Identifier: Apache-2.0

/** How a peer is written into `peer_addrs` and `bootstrap_addrs` */
export enum PeerAddressFormat {
  /** the peer's first listen address with its host replaced by the public IP, plus `/p2p/<peer_id>` */
  Multiaddr = 'multiaddr',
  Ip = 'ip',
  /** `<ip>:<port>`, port taken from the first listen address */
  IpPort = 'ip-port',
}
