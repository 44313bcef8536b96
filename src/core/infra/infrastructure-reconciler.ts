// SPDX-License-Identifier: Apache-2.0

import {type CloudProvider} from '../../integration/cloud/cloud-provider.js';
import {type Instance, InstanceStatus} from '../../integration/cloud/resources/instance/instance.js';
import {type FirewallRule} from '../../integration/cloud/resources/firewall/firewall-rule.js';
import {type DeployedStateStore} from '../state/deployed-state-store.js';
import {type DesiredState} from '../metadata/desired-state.js';
import {type NodeSpec} from '../metadata/node-spec.js';
import {NodeKind} from '../metadata/node-kind.js';
import {type NetLogger} from '../logging/net-logger.js';
import {type NodeResult, NodeResults} from '../results/node-result.js';
import {desiredP2pPorts, mergePorts, missingPorts} from './firewall-ports.js';
import {pollWithBackoff, RetryExhaustedError, type RetryPolicy, type Sleeper} from '../util/retry.js';
import {settleWithLimit, sleep} from '../helpers.js';
import {ProvisioningTimeoutError} from '../errors/provisioning-timeout-error.js';
import {type IP} from '../../types/aliases.js';
import * as constants from '../constants.js';

export const INFRA_STAGE = 'infra';
export const ACCESS_STAGE = 'access';

/** Instance states that need an explicit start; GCE reports a stopped VM as TERMINATED */
const STARTABLE: ReadonlySet<InstanceStatus> = new Set([InstanceStatus.Stopped, InstanceStatus.Terminated]);

const NODE_TAGS: readonly string[] = [NodeKind.Validator, NodeKind.Boot];

export interface InfraOptions {
  /** prefix of the shared firewall rules */
  resourcePrefix: string;
  /** nodes reconciled at once within a wave, 0 for no limit */
  concurrency: number;
  ipPollPolicy?: RetryPolicy;
  sleeper?: Sleeper;
}

/** GCE label values: lowercase letters, digits, `_` and `-`, at most 63 characters */
export function toLabelValue(value: string): string {
  return value
    .toLowerCase()
    .replaceAll(/[^a-z0-9_-]/g, '-')
    .slice(0, 63);
}

/**
 * Brings cloud resources in line with the desired nodes. Each node is reconciled on its own: a failure is reported in
 * its result and never stops its siblings. Every node that ends up with a public IP is written to the state store.
 */
export class InfrastructureReconciler {
  private readonly ipPollPolicy: RetryPolicy;
  private readonly sleeper: Sleeper;

  public constructor(
    private readonly cloud: CloudProvider,
    private readonly store: DeployedStateStore,
    private readonly logger: NetLogger,
    private readonly options: InfraOptions,
  ) {
    this.ipPollPolicy = options.ipPollPolicy ?? {
      maxAttempts: constants.IP_POLL_MAX_ATTEMPTS,
      baseDelayMs: constants.IP_POLL_BASE_DELAY_MS,
      maxDelayMs: constants.IP_POLL_MAX_DELAY_MS,
    };
    this.sleeper = options.sleeper ?? sleep;
  }

  public get p2pRuleName(): string {
    return `${this.options.resourcePrefix}${constants.FIREWALL_P2P_SUFFIX}`;
  }

  public get sshRuleName(): string {
    return `${this.options.resourcePrefix}${constants.FIREWALL_SSH_SUFFIX}`;
  }

  /**
   * Reconciles every node, boot nodes first; within a wave nodes run concurrently up to the configured limit.
   */
  public async reconcileNodes(desired: DesiredState): Promise<NodeResult[]> {
    const results: NodeResult[] = [];
    for (const wave of desired.waves) {
      const settled = await settleWithLimit(wave, this.options.concurrency, node => this.reconcileNode(node, desired));
      for (const [index, outcome] of settled.entries()) {
        const node = wave[index];
        if (outcome.status === 'fulfilled') {
          results.push(NodeResults.ok(node.nodeName, INFRA_STAGE, `ip ${outcome.value}`));
        } else {
          this.logger
            .withContext({node: node.nodeName, stage: INFRA_STAGE})
            .error(`Infra failed for ${node.nodeName}`, outcome.reason);
          results.push(NodeResults.failed(node.nodeName, INFRA_STAGE, outcome.reason));
        }
      }
    }
    return results;
  }

  /**
   * Ensures instance, data disk and public IP of one node and caches the result.
   * @returns the node's public IP
   */
  public async reconcileNode(node: NodeSpec, desired: DesiredState): Promise<IP> {
    const log = this.logger.withContext({node: node.nodeName, stage: INFRA_STAGE});
    const runConfig = desired.runConfigFor(node);
    const labels = {
      [constants.MANAGED_LABEL]: 'true',
      [constants.TEAM_LABEL]: toLabelValue(node.team),
      [constants.NODE_LABEL]: node.nodeName,
    };

    const instance = await this.ensureInstance(node, labels, log);
    if (runConfig.usesPersistentDisk(node.kind)) {
      await this.ensureDataDisk(node, instance, runConfig.dbDiskGb, labels, log);
    }

    const ip = await this.waitForPublicIp(node.nodeName);
    await this.store.upsert(node.nodeName, {team: node.team, address: node.address, peerId: node.peerId, ip});
    log.info(`Node ${node.nodeName} ready at ${ip}`);
    return ip;
  }

  /**
   * Ensures the shared p2p and ssh firewall rules and registers the deployment ssh key. Rules only ever grow.
   */
  public async reconcileAccess(desired: DesiredState, sshUser: string, publicKey: string): Promise<NodeResult[]> {
    const results: NodeResult[] = [];

    const ports = desiredP2pPorts(desired.nodes);
    if (ports.length === 0) {
      results.push(NodeResults.ok(this.p2pRuleName, ACCESS_STAGE, 'no p2p ports declared'));
    } else {
      results.push(
        await this.ensureRule({
          name: this.p2pRuleName,
          description: 'p2p traffic between deploynet nodes',
          allowed: ports,
          sourceTags: [...NODE_TAGS],
          sourceRanges: [],
          targetTags: [...NODE_TAGS],
        }),
      );
    }

    results.push(
      await this.ensureRule({
        name: this.sshRuleName,
        description: 'ssh access to deploynet nodes',
        allowed: [{protocol: 'tcp', port: constants.SSH_PORT}],
        sourceTags: [],
        sourceRanges: ['0.0.0.0/0'],
        targetTags: [...NODE_TAGS],
      }),
    );

    try {
      const added = await this.cloud.sshKeys().register(sshUser, publicKey);
      results.push(NodeResults.ok('ssh-key', ACCESS_STAGE, added ? `registered for ${sshUser}` : 'already registered'));
    } catch (error) {
      results.push(NodeResults.failed('ssh-key', ACCESS_STAGE, error));
    }

    return results;
  }

  private async ensureInstance(node: NodeSpec, labels: Record<string, string>, log: NetLogger): Promise<Instance> {
    const instances = this.cloud.instances();
    const existing = await instances.read(node.nodeName);
    if (!existing) {
      log.info(`Creating instance ${node.nodeName}`);
      return instances.create({
        name: node.nodeName,
        machineType: node.isBoot ? constants.DEFAULT_BOOT_MACHINE_TYPE : constants.DEFAULT_VALIDATOR_MACHINE_TYPE,
        sourceImage: constants.DEFAULT_SOURCE_IMAGE,
        bootDiskGb: constants.DEFAULT_BOOT_DISK_GB,
        tags: [node.kind],
        labels,
      });
    }

    log.debug(`Instance ${node.nodeName} exists (${existing.status})`);
    if (!existing.tags.includes(node.kind)) {
      await instances.addTags(node.nodeName, [node.kind]);
    }
    if (STARTABLE.has(existing.status)) {
      log.info(`Starting stopped instance ${node.nodeName}`);
      await instances.start(node.nodeName);
    }
    if (!existing.hasExternalAccess) {
      await instances.addExternalAccess(node.nodeName);
    }
    return existing;
  }

  private async ensureDataDisk(
    node: NodeSpec,
    instance: Instance,
    sizeGb: number,
    labels: Record<string, string>,
    log: NetLogger,
  ): Promise<void> {
    const diskName = `${node.nodeName}${constants.DATA_DISK_SUFFIX}`;
    const disks = this.cloud.disks();

    let disk = await disks.read(diskName);
    if (disk) {
      if (disk.sizeGb !== sizeGb) {
        log.warn(`Disk ${diskName} is ${disk.sizeGb}GB, run config asks for ${sizeGb}GB; leaving it as is`);
      }
    } else {
      log.info(`Creating disk ${diskName} (${sizeGb}GB)`);
      disk = await disks.create({name: diskName, sizeGb, diskType: constants.DEFAULT_DATA_DISK_TYPE, labels});
    }

    if (!instance.attachedDisks.includes(diskName) && !disk.users.includes(node.nodeName)) {
      log.info(`Attaching disk ${diskName} to ${node.nodeName}`);
      await this.cloud.instances().attachDisk(node.nodeName, diskName);
    }
  }

  private async waitForPublicIp(nodeName: string): Promise<IP> {
    try {
      return await pollWithBackoff<IP>(
        this.ipPollPolicy,
        async () => {
          const ip = await this.cloud.instances().publicIp(nodeName);
          return ip ? {done: true, value: ip} : {done: false, reason: 'no external IP assigned yet'};
        },
        this.sleeper,
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new ProvisioningTimeoutError(`public IP of ${nodeName}`, error.attempts, error);
      }
      throw error;
    }
  }

  private async ensureRule(rule: FirewallRule): Promise<NodeResult> {
    const firewalls = this.cloud.firewalls();
    try {
      const existing = await firewalls.read(rule.name);
      if (!existing) {
        this.logger.info(`Creating firewall rule ${rule.name}`);
        await firewalls.create(rule);
        return NodeResults.ok(rule.name, ACCESS_STAGE, 'created');
      }

      const absentPorts = missingPorts(existing.allowed, rule.allowed);
      const absentSourceTags = rule.sourceTags.filter(tag => !existing.sourceTags.includes(tag));
      const absentTargetTags = rule.targetTags.filter(tag => !existing.targetTags.includes(tag));
      const absentRanges = rule.sourceRanges.filter(range => !existing.sourceRanges.includes(range));
      if (
        absentPorts.length === 0 &&
        absentSourceTags.length === 0 &&
        absentTargetTags.length === 0 &&
        absentRanges.length === 0
      ) {
        return NodeResults.ok(rule.name, ACCESS_STAGE, 'up to date');
      }

      this.logger.info(`Updating firewall rule ${rule.name}`);
      await firewalls.update({
        ...rule,
        allowed: mergePorts(existing.allowed, absentPorts),
        sourceTags: [...existing.sourceTags, ...absentSourceTags],
        sourceRanges: [...existing.sourceRanges, ...absentRanges],
        targetTags: [...existing.targetTags, ...absentTargetTags],
      });
      return NodeResults.ok(rule.name, ACCESS_STAGE, 'updated');
    } catch (error) {
      this.logger.error(`Firewall rule ${rule.name} failed`, error);
      return NodeResults.failed(rule.name, ACCESS_STAGE, error);
    }
  }
}
