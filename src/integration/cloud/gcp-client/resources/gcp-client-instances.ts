// SPDX-License-Identifier: Apache-2.0

import {type InstancesClient} from '@google-cloud/compute';
import {type Instances} from '../../resources/instance/instances.js';
import {type Instance, type InstanceSpec} from '../../resources/instance/instance.js';
import {GcpClientBase} from '../gcp-client-base.js';
import {type GcpOperations} from '../gcp-operations.js';
import {labelFilter, toInstance} from '../gcp-resource-mapper.js';
import {ProvisioningError} from '../../../../core/errors/provisioning-error.js';
import {type IP} from '../../../../types/aliases.js';

export class GcpClientInstances extends GcpClientBase implements Instances {
  public constructor(
    project: string,
    zone: string,
    operations: GcpOperations,
    private readonly client: InstancesClient,
  ) {
    super(project, zone, operations);
  }

  public async read(name: string): Promise<Instance | undefined> {
    const response = await this.find('read instance', name, () =>
      this.client.get({project: this.project, zone: this.zone, instance: name}),
    );
    return response ? toInstance(response[0]) : undefined;
  }

  public async create(spec: InstanceSpec): Promise<Instance> {
    await this.call('create instance', spec.name, async () => {
      const [operation] = await this.client.insert({
        project: this.project,
        zone: this.zone,
        instanceResource: {
          name: spec.name,
          machineType: `zones/${this.zone}/machineTypes/${spec.machineType}`,
          disks: [
            {
              boot: true,
              autoDelete: true,
              initializeParams: {sourceImage: spec.sourceImage, diskSizeGb: spec.bootDiskGb},
            },
          ],
          networkInterfaces: [
            {
              network: 'global/networks/default',
              accessConfigs: [{name: 'External NAT', type: 'ONE_TO_ONE_NAT'}],
            },
          ],
          tags: {items: spec.tags},
          labels: spec.labels,
        },
      });
      await this.operations.waitZone(operation, `create instance ${spec.name}`);
    });

    const created = await this.read(spec.name);
    if (!created) {
      throw new ProvisioningError(`instance '${spec.name}' is missing after creation`);
    }
    return created;
  }

  public async addTags(name: string, tags: string[]): Promise<void> {
    await this.call('tag instance', name, async () => {
      const [resource] = await this.client.get({project: this.project, zone: this.zone, instance: name});
      const current = resource.tags?.items ?? [];
      const items = [...new Set([...current, ...tags])];
      if (items.length === current.length) {
        return;
      }

      const [operation] = await this.client.setTags({
        project: this.project,
        zone: this.zone,
        instance: name,
        tagsResource: {items, fingerprint: resource.tags?.fingerprint},
      });
      await this.operations.waitZone(operation, `tag instance ${name}`);
    });
  }

  public async start(name: string): Promise<void> {
    await this.call('start instance', name, async () => {
      const [operation] = await this.client.start({project: this.project, zone: this.zone, instance: name});
      await this.operations.waitZone(operation, `start instance ${name}`);
    });
  }

  public async addExternalAccess(name: string): Promise<void> {
    await this.call('add external access to instance', name, async () => {
      const [resource] = await this.client.get({project: this.project, zone: this.zone, instance: name});
      const nic = resource.networkInterfaces?.[0];
      const [operation] = await this.client.addAccessConfig({
        project: this.project,
        zone: this.zone,
        instance: name,
        networkInterface: nic?.name ?? 'nic0',
        accessConfigResource: {name: 'External NAT', type: 'ONE_TO_ONE_NAT'},
      });
      await this.operations.waitZone(operation, `add external access to ${name}`);
    });
  }

  public async attachDisk(name: string, diskName: string): Promise<void> {
    await this.call('attach disk to instance', name, async () => {
      const [operation] = await this.client.attachDisk({
        project: this.project,
        zone: this.zone,
        instance: name,
        attachedDiskResource: {source: this.diskUrl(diskName), deviceName: diskName, autoDelete: false, boot: false},
      });
      await this.operations.waitZone(operation, `attach disk ${diskName} to ${name}`);
    });
  }

  public async publicIp(name: string): Promise<IP | undefined> {
    const instance = await this.read(name);
    return instance?.publicIp;
  }

  public async list(labels: Record<string, string>): Promise<Instance[]> {
    return this.call('list instances in zone', this.zone, async () => {
      const [resources] = await this.client.list({project: this.project, zone: this.zone, filter: labelFilter(labels)});
      return resources.map(toInstance);
    });
  }
}
