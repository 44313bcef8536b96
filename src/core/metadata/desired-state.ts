// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {type NodeSpec} from './node-spec.js';
import {type RunConfig} from './run-config.js';
import {NodeKind, NODE_KIND_ORDER} from './node-kind.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {PathEx} from '../util/path-ex.js';
import * as constants from '../constants.js';
import {type NodeName} from '../../types/aliases.js';

export interface DesiredStateSources {
  networkConfigDirectory: string;
  validatorsDirectory: string;
  bootNodesDirectory: string;
}

/** A team's run config, or the configuration error every node of that team and kind fails with */
export type RunConfigEntry = RunConfig | ConfigurationError;

export function runConfigKey(team: string, kind: NodeKind): string {
  return `${team}/${kind}`;
}

/**
 * The desired network for one run: every node, boot nodes first, plus the run config of each team and kind.
 */
export class DesiredState {
  private readonly byName: Map<NodeName, NodeSpec>;

  public constructor(
    public readonly nodes: readonly NodeSpec[],
    private readonly runConfigs: ReadonlyMap<string, RunConfigEntry>,
    public readonly sources: DesiredStateSources,
  ) {
    this.byName = new Map(nodes.map(node => [node.nodeName, node]));
  }

  public get bootNodes(): NodeSpec[] {
    return this.nodes.filter(node => node.kind === NodeKind.Boot);
  }

  public get validators(): NodeSpec[] {
    return this.nodes.filter(node => node.kind === NodeKind.Validator);
  }

  /** Nodes grouped in start order: boot nodes, then validators */
  public get waves(): NodeSpec[][] {
    return NODE_KIND_ORDER.map(kind => this.nodes.filter(node => node.kind === kind)).filter(wave => wave.length > 0);
  }

  public node(nodeName: NodeName): NodeSpec | undefined {
    return this.byName.get(nodeName);
  }

  /**
   * @throws ConfigurationError when the team's run config is missing or invalid
   */
  public runConfigFor(node: NodeSpec): RunConfig {
    const entry = this.runConfigs.get(runConfigKey(node.team, node.kind));
    if (entry === undefined) {
      throw new ConfigurationError(`no ${node.kind} run config loaded for team '${node.team}'`);
    }
    if (entry instanceof ConfigurationError) {
      throw entry;
    }
    return entry;
  }

  /**
   * Locates the p2p identity of a node: `<validators>/<team>/id_<address>.json`, with `id_boot.json` as the fallback
   * for boot nodes.
   *
   * @throws ConfigurationError when no identity file exists
   */
  public identityFileFor(node: NodeSpec): string {
    const candidates = [`id_${node.address}.json`];
    if (node.isBoot) {
      candidates.push(constants.BOOT_IDENTITY_FILE);
    }

    const teamDirectory = PathEx.join(this.sources.validatorsDirectory, node.team);
    for (const candidate of candidates) {
      if (fs.existsSync(PathEx.join(teamDirectory, candidate))) {
        return PathEx.safeJoinWithBaseDirConfinement(this.sources.validatorsDirectory, node.team, candidate);
      }
    }

    throw new ConfigurationError(
      `identity file for '${node.nodeName}' not found (looked for ${candidates.join(', ')} in ${teamDirectory})`,
      undefined,
      {node: node.nodeName},
    );
  }
}
