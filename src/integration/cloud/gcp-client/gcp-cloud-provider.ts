// SPDX-License-Identifier: Apache-2.0

import {
  DisksClient,
  FirewallsClient,
  GlobalOperationsClient,
  InstancesClient,
  ProjectsClient,
  ZoneOperationsClient,
} from '@google-cloud/compute';
import {type CloudProvider, type CloudSettings} from '../cloud-provider.js';
import {type Instances} from '../resources/instance/instances.js';
import {type Disks} from '../resources/disk/disks.js';
import {type Firewalls} from '../resources/firewall/firewalls.js';
import {type SshKeys} from '../resources/ssh-key/ssh-keys.js';
import {ProviderName} from '../provider-name.js';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {GcpOperations} from './gcp-operations.js';
import {GcpClientInstances} from './resources/gcp-client-instances.js';
import {GcpClientDisks} from './resources/gcp-client-disks.js';
import {GcpClientFirewalls} from './resources/gcp-client-firewalls.js';
import {GcpClientSshKeys} from './resources/gcp-client-ssh-keys.js';

/**
 * Google Compute Engine provider. Every client is created from the explicit settings; nothing is read from ambient
 * globals apart from application default credentials when no key file is given.
 */
export class GcpCloudProvider implements CloudProvider {
  public readonly name = ProviderName.Gcp;
  public readonly project: string;
  public readonly zone: string;

  private readonly gcpInstances: Instances;
  private readonly gcpDisks: Disks;
  private readonly gcpFirewalls: Firewalls;
  private readonly gcpSshKeys: SshKeys;

  public constructor(settings: CloudSettings, logger: NetLogger) {
    this.project = settings.project;
    this.zone = settings.zone;

    const options = settings.credentials ? {keyFilename: settings.credentials} : {};
    const operations = new GcpOperations(
      this.project,
      this.zone,
      new ZoneOperationsClient(options),
      new GlobalOperationsClient(options),
      logger,
    );

    this.gcpInstances = new GcpClientInstances(this.project, this.zone, operations, new InstancesClient(options));
    this.gcpDisks = new GcpClientDisks(this.project, this.zone, operations, new DisksClient(options));
    this.gcpFirewalls = new GcpClientFirewalls(this.project, this.zone, operations, new FirewallsClient(options));
    this.gcpSshKeys = new GcpClientSshKeys(this.project, this.zone, operations, new ProjectsClient(options));
  }

  public instances(): Instances {
    return this.gcpInstances;
  }

  public disks(): Disks {
    return this.gcpDisks;
  }

  public firewalls(): Firewalls {
    return this.gcpFirewalls;
  }

  public sshKeys(): SshKeys {
    return this.gcpSshKeys;
  }
}
