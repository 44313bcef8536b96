// SPDX-License-Identifier: Apache-2.0

import {type FirewallsClient} from '@google-cloud/compute';
import {type Firewalls} from '../../resources/firewall/firewalls.js';
import {type FirewallRule} from '../../resources/firewall/firewall-rule.js';
import {GcpClientBase} from '../gcp-client-base.js';
import {type GcpOperations} from '../gcp-operations.js';
import {toFirewallResource, toFirewallRule} from '../gcp-resource-mapper.js';

export class GcpClientFirewalls extends GcpClientBase implements Firewalls {
  public constructor(
    project: string,
    zone: string,
    operations: GcpOperations,
    private readonly client: FirewallsClient,
  ) {
    super(project, zone, operations);
  }

  public async read(name: string): Promise<FirewallRule | undefined> {
    const response = await this.find('read firewall rule', name, () =>
      this.client.get({project: this.project, firewall: name}),
    );
    return response ? toFirewallRule(response[0]) : undefined;
  }

  public async create(rule: FirewallRule): Promise<void> {
    await this.call('create firewall rule', rule.name, async () => {
      const [operation] = await this.client.insert({project: this.project, firewallResource: toFirewallResource(rule)});
      await this.operations.waitGlobal(operation, `create firewall rule ${rule.name}`);
    });
  }

  public async update(rule: FirewallRule): Promise<void> {
    await this.call('update firewall rule', rule.name, async () => {
      const [operation] = await this.client.patch({
        project: this.project,
        firewall: rule.name,
        firewallResource: toFirewallResource(rule),
      });
      await this.operations.waitGlobal(operation, `update firewall rule ${rule.name}`);
    });
  }
}
