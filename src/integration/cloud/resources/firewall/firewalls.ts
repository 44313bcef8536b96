// SPDX-License-Identifier: Apache-2.0

import {type FirewallRule} from './firewall-rule.js';

export interface Firewalls {
  /**
   * @returns the rule, or undefined when it does not exist
   */
  read(name: string): Promise<FirewallRule | undefined>;

  create(rule: FirewallRule): Promise<void>;

  /**
   * Replace the allowed ports and tags of an existing rule
   */
  update(rule: FirewallRule): Promise<void>;
}
