// SPDX-License-Identifier: Apache-2.0

import {type DisksClient} from '@google-cloud/compute';
import {type Disks} from '../../resources/disk/disks.js';
import {type Disk, type DiskSpec} from '../../resources/disk/disk.js';
import {GcpClientBase} from '../gcp-client-base.js';
import {type GcpOperations} from '../gcp-operations.js';
import {toDisk} from '../gcp-resource-mapper.js';
import {ProvisioningError} from '../../../../core/errors/provisioning-error.js';

export class GcpClientDisks extends GcpClientBase implements Disks {
  public constructor(
    project: string,
    zone: string,
    operations: GcpOperations,
    private readonly client: DisksClient,
  ) {
    super(project, zone, operations);
  }

  public async read(name: string): Promise<Disk | undefined> {
    const response = await this.find('read disk', name, () =>
      this.client.get({project: this.project, zone: this.zone, disk: name}),
    );
    return response ? toDisk(response[0]) : undefined;
  }

  public async create(spec: DiskSpec): Promise<Disk> {
    await this.call('create disk', spec.name, async () => {
      const [operation] = await this.client.insert({
        project: this.project,
        zone: this.zone,
        diskResource: {
          name: spec.name,
          sizeGb: spec.sizeGb,
          type: `projects/${this.project}/zones/${this.zone}/diskTypes/${spec.diskType}`,
          labels: spec.labels,
        },
      });
      await this.operations.waitZone(operation, `create disk ${spec.name}`);
    });

    const created = await this.read(spec.name);
    if (!created) {
      throw new ProvisioningError(`disk '${spec.name}' is missing after creation`);
    }
    return created;
  }
}
