// SPDX-License-Identifier: Apache-2.0

import {type NetLogger} from '../core/logging/net-logger.js';
import {type ConfigManager} from '../core/config-manager.js';
import {type DesiredState} from '../core/metadata/desired-state.js';
import {type DeployedStateStore} from '../core/state/deployed-state-store.js';
import {type Stage} from '../core/stages/stage.js';
import {ACCESS_STAGE, INFRA_STAGE, InfrastructureReconciler} from '../core/infra/infrastructure-reconciler.js';
import {APP_STAGE, ApplicationDeployer} from '../core/app/application-deployer.js';
import {IpResolver} from '../core/app/ip-resolver.js';
import {PeerAddressPolicies} from '../core/app/peer-address-policy.js';
import {PeerAddressFormat} from '../core/app/peer-address-format.js';
import {type TemplateRenderer} from '../core/templates/template-renderer.js';
import {type CloudProvider} from '../integration/cloud/cloud-provider.js';
import {type HostFactoryProvider} from '../integration/host/host-factory-provider.js';
import {ensureSshKeyPair} from '../integration/host/ssh/ssh-key-pair.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {isValidEnum} from '../core/util/validation-helpers.js';
import {Flags as flags} from './flags.js';
import {type IP, type NodeName} from '../types/aliases.js';

export type CloudProviderSupplier = () => CloudProvider;

/**
 * Builds the stages of the infra, app and deploy commands from the current flag values. The cloud provider is only
 * created when a stage first needs it, so `app` with a fully cached state never touches the cloud API.
 */
export class NetworkStages {
  private cloud?: CloudProvider;

  public constructor(
    private readonly logger: NetLogger,
    private readonly configManager: ConfigManager,
    private readonly store: DeployedStateStore,
    private readonly cloudSupplier: CloudProviderSupplier,
    private readonly hostProviders: HostFactoryProvider,
    private readonly renderer: TemplateRenderer,
  ) {}

  public access(): Stage<DesiredState> {
    return {
      name: ACCESS_STAGE,
      dependsOn: [],
      run: async desired => {
        const keyPair = ensureSshKeyPair(this.configManager.getRequiredString(flags.sshKey), this.logger);
        return this.reconciler().reconcileAccess(
          desired,
          this.configManager.getRequiredString(flags.sshUser),
          keyPair.publicKey,
        );
      },
    };
  }

  public infra(): Stage<DesiredState> {
    return {
      name: INFRA_STAGE,
      dependsOn: [],
      run: async desired => {
        const cloud = this.cloudProvider();
        await this.store.setMetadata(cloud.project, cloud.zone);
        return this.reconciler().reconcileNodes(desired);
      },
    };
  }

  public app(dependsOn: readonly string[] = []): Stage<DesiredState> {
    return {
      name: APP_STAGE,
      dependsOn,
      run: async desired => this.deployer().deployNodes(desired),
    };
  }

  private cloudProvider(): CloudProvider {
    this.cloud ??= this.cloudSupplier();
    return this.cloud;
  }

  private reconciler(): InfrastructureReconciler {
    return new InfrastructureReconciler(this.cloudProvider(), this.store, this.logger, {
      resourcePrefix: this.configManager.getRequiredString(flags.resourcePrefix),
      concurrency: this.configManager.getNumber(flags.concurrency),
    });
  }

  private deployer(): ApplicationDeployer {
    const format = this.configManager.getRequiredString(flags.peerAddressFormat);
    if (!isValidEnum(format, PeerAddressFormat)) {
      throw new IllegalArgumentError(`unknown peer address format: ${format}`, format);
    }

    const lookup = async (nodeName: NodeName): Promise<IP | undefined> =>
      this.cloudProvider().instances().publicIp(nodeName);

    const hosts = this.hostProviders.create({
      user: this.configManager.getRequiredString(flags.sshUser),
      privateKeyPath: this.configManager.getRequiredString(flags.sshKey),
    });

    return new ApplicationDeployer(hosts, new IpResolver(this.store, lookup, this.logger), this.renderer, this.logger, {
      network: this.configManager.getRequiredString(flags.network),
      concurrency: this.configManager.getNumber(flags.concurrency),
      policy: PeerAddressPolicies.of(format),
    });
  }
}
