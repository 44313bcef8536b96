// SPDX-License-Identifier: Apache-2.0

import {type HostFactory, type Host} from '../../integration/host/host.js';
import {type ContainerSpec} from '../../integration/host/container-spec.js';
import {type DesiredState} from '../metadata/desired-state.js';
import {type NodeSpec} from '../metadata/node-spec.js';
import {type RunConfig} from '../metadata/run-config.js';
import {type TemplateRenderer} from '../templates/template-renderer.js';
import {PlaceholderSets} from '../templates/placeholder-sets.js';
import {type NetLogger} from '../logging/net-logger.js';
import {type NodeResult, NodeResults} from '../results/node-result.js';
import {type IpResolver} from './ip-resolver.js';
import {type PeerAddressPolicy} from './peer-address-policy.js';
import {nodeVariables} from './peer-variables.js';
import {settleWithLimit} from '../helpers.js';
import {DeployNetError} from '../errors/deploy-net-error.js';
import * as constants from '../constants.js';

export const APP_STAGE = 'app';

export interface AppOptions {
  network: string;
  /** nodes deployed at once within a wave, 0 for no limit */
  concurrency: number;
  policy: PeerAddressPolicy;
}

/** What a node's container needs once configuration has been checked */
export interface NodePlan {
  node: NodeSpec;
  runConfig: RunConfig;
  identityFile: string;
  command: string[];
}

/**
 * Starts node containers, boot nodes first. Configuration problems of a node (run config, identity file, template) are
 * found before its host is contacted and fail only that node.
 */
export class ApplicationDeployer {
  public constructor(
    private readonly hosts: HostFactory,
    private readonly ipResolver: IpResolver,
    private readonly renderer: TemplateRenderer,
    private readonly logger: NetLogger,
    private readonly options: AppOptions,
  ) {}

  public async deployNodes(desired: DesiredState): Promise<NodeResult[]> {
    const results: NodeResult[] = [];
    for (const wave of desired.waves) {
      const settled = await settleWithLimit(wave, this.options.concurrency, node => this.deployNode(node, desired));
      for (const [index, outcome] of settled.entries()) {
        const node = wave[index];
        if (outcome.status === 'fulfilled') {
          results.push(NodeResults.ok(node.nodeName, APP_STAGE, outcome.value));
        } else {
          this.logger
            .withContext({node: node.nodeName, stage: APP_STAGE})
            .error(`Deploy failed for ${node.nodeName}`, outcome.reason);
          results.push(NodeResults.failed(node.nodeName, APP_STAGE, outcome.reason));
        }
      }
    }
    return results;
  }

  /**
   * @returns a short description of the started container
   */
  public async deployNode(node: NodeSpec, desired: DesiredState): Promise<string> {
    const plan = await this.plan(node, desired);
    const ip = await this.ipResolver.resolve(node);

    const host = await this.hosts.connect(ip);
    try {
      const containerId = await this.startContainer(host, plan);
      this.logger
        .withContext({node: node.nodeName, stage: APP_STAGE})
        .info(`Node ${node.nodeName} running on ${ip} (${containerId.slice(0, 12)})`);
      return `container ${containerId.slice(0, 12)} on ${ip}`;
    } finally {
      await this.closeQuietly(host);
    }
  }

  public async plan(node: NodeSpec, desired: DesiredState): Promise<NodePlan> {
    const runConfig = desired.runConfigFor(node);
    const identityFile = desired.identityFileFor(node);
    const variables = await nodeVariables(node, desired, runConfig, this.options.network, this.options.policy, peer =>
      this.ipResolver.resolve(peer),
    );
    const command = this.renderer.render(runConfig.cmd, variables, PlaceholderSets.forKind(node.kind));
    return {node, runConfig, identityFile, command};
  }

  private async startContainer(host: Host, plan: NodePlan): Promise<string> {
    const {node, runConfig} = plan;
    await host.containers().ensureRuntime();

    const home = await host.files().home();
    const remoteIdentity = `${home}/${constants.REMOTE_IDENTITY_DIR}/${node.nodeName}/identity.json`;
    await host.files().upload(plan.identityFile, remoteIdentity, 0o644);

    let hostDataDirectory: string;
    if (runConfig.usesPersistentDisk(node.kind)) {
      hostDataDirectory = `${constants.DISK_MOUNT_ROOT}/${node.nodeName}`;
      await host.disks().mount(`${node.nodeName}${constants.DATA_DISK_SUFFIX}`, hostDataDirectory);
    } else {
      hostDataDirectory = `${home}/${node.nodeName}-data`;
      await host.files().ensureDirectory(hostDataDirectory);
    }

    await host.containers().pull(runConfig.image);

    const spec: ContainerSpec = {
      name: node.nodeName,
      image: runConfig.image,
      cmd: plan.command,
      env: runConfig.env,
      binds: [`${hostDataDirectory}:${runConfig.dataDir}`, `${remoteIdentity}:${runConfig.p2pIdentityPath}:ro`],
      ports: runConfig.ports.map(port => ({host: port.host, container: port.container, protocol: port.protocol})),
      networkMode: runConfig.effectiveNetworkMode(),
      restartPolicy: constants.CONTAINER_RESTART_POLICY,
      labels: {[constants.MANAGED_LABEL]: 'true', [constants.NODE_LABEL]: node.nodeName},
    };
    return host.containers().replace(spec);
  }

  private async closeQuietly(host: Host): Promise<void> {
    try {
      await host.close();
    } catch (error) {
      this.logger.debug(`Closing session to ${host.ip} failed: ${DeployNetError.messageOf(error)}`);
    }
  }
}
