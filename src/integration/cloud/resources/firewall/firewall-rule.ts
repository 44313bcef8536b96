// SPDX-License-Identifier: Apache-2.0

import {type TransportPort} from '../../../../core/metadata/multiaddr.js';

/** An ingress rule on the default network */
export interface FirewallRule {
  name: string;
  description?: string;
  allowed: TransportPort[];
  /** instance tags allowed as traffic source; empty when only `sourceRanges` apply */
  sourceTags: string[];
  sourceRanges: string[];
  targetTags: string[];
}
