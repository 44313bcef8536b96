// SPDX-License-Identifier: Apache-2.0

import {NodeKind} from '../metadata/node-kind.js';

const BOOT_PLACEHOLDERS = [
  'address',
  'node_name',
  'peer_id',
  'team',
  'listen_addresses',
  'peer_addrs',
  'bootstrap_addrs',
  'network',
  'image',
  'data_dir',
  'p2p_identity_path',
] as const;

const VALIDATOR_PLACEHOLDERS = [...BOOT_PLACEHOLDERS, 'validator_addrs'] as const;

export type Placeholder = (typeof VALIDATOR_PLACEHOLDERS)[number];

/**
 * The closed set of variables a command template may reference, per node kind.
 */
export class PlaceholderSets {
  private static readonly sets: ReadonlyMap<NodeKind, ReadonlySet<string>> = new Map([
    [NodeKind.Boot, new Set<string>(BOOT_PLACEHOLDERS)],
    [NodeKind.Validator, new Set<string>(VALIDATOR_PLACEHOLDERS)],
  ]);

  public static forKind(kind: NodeKind): ReadonlySet<string> {
    return PlaceholderSets.sets.get(kind) ?? new Set<string>();
  }
}
