// SPDX-License-Identifier: Apache-2.0

import {type ProjectsClient} from '@google-cloud/compute';
import {type SshKeys} from '../../resources/ssh-key/ssh-keys.js';
import {GcpClientBase} from '../gcp-client-base.js';
import {type GcpOperations} from '../gcp-operations.js';

const SSH_KEYS_METADATA_KEY = 'ssh-keys';

/** Keys live in the project wide `ssh-keys` metadata item as `<user>:<public key>` lines */
export class GcpClientSshKeys extends GcpClientBase implements SshKeys {
  public constructor(
    project: string,
    zone: string,
    operations: GcpOperations,
    private readonly client: ProjectsClient,
  ) {
    super(project, zone, operations);
  }

  public async register(user: string, publicKey: string): Promise<boolean> {
    const entry = `${user}:${publicKey.trim()}`;

    return this.call('register ssh key in project', this.project, async () => {
      const [project] = await this.client.get({project: this.project});
      const metadata = project.commonInstanceMetadata ?? {};
      const items = metadata.items ?? [];
      const existing = items.find(item => item.key === SSH_KEYS_METADATA_KEY)?.value ?? '';
      const keys = existing.split('\n').filter(line => line.trim().length > 0);
      if (keys.includes(entry)) {
        return false;
      }

      const [operation] = await this.client.setCommonInstanceMetadata({
        project: this.project,
        metadataResource: {
          fingerprint: metadata.fingerprint,
          items: [
            ...items.filter(item => item.key !== SSH_KEYS_METADATA_KEY),
            {key: SSH_KEYS_METADATA_KEY, value: [...keys, entry].join('\n')},
          ],
        },
      });
      await this.operations.waitGlobal(operation, 'update project ssh keys');
      return true;
    });
  }
}
