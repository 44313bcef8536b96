// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type NetLogger} from '../logging/net-logger.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {JsonFileStorageBackend} from '../../data/backend/impl/json-file-storage-backend.js';
import {YamlFileStorageBackend} from '../../data/backend/impl/yaml-file-storage-backend.js';
import {StorageBackendError} from '../../data/backend/api/storage-backend-error.js';
import {NodeSpec} from './node-spec.js';
import {RunConfig} from './run-config.js';
import {NodeKind, NODE_KIND_ORDER} from './node-kind.js';
import {DesiredState, type DesiredStateSources, type RunConfigEntry, runConfigKey} from './desired-state.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {MissingRunConfigError} from '../errors/missing-run-config-error.js';
import {DeployNetError} from '../errors/deploy-net-error.js';
import {PathEx} from '../util/path-ex.js';
import * as constants from '../constants.js';

interface RunConfigCandidate {
  directory: string;
  file: string;
}

/**
 * Reads the canonical node list and the per-team run configs. Malformed node metadata fails the whole load; a missing
 * or invalid run config is kept as an error and fails only the nodes that use it.
 */
@injectable()
export class DesiredStateLoader {
  public constructor(
    @inject(InjectTokens.NetLogger) private readonly logger: NetLogger,
    @inject(InjectTokens.ObjectMapper) private readonly mapper: ObjectMapper,
  ) {
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
    this.mapper = patchInject(mapper, InjectTokens.ObjectMapper, this.constructor.name);
  }

  public async load(sources: DesiredStateSources): Promise<DesiredState> {
    const backend = this.openBackend(sources.networkConfigDirectory);

    const nodes: NodeSpec[] = await this.readNodeList(backend, constants.VALIDATORS_FILE);
    if (await backend.exists(constants.BOOT_NODES_FILE)) {
      nodes.push(...(await this.readNodeList(backend, constants.BOOT_NODES_FILE, NodeKind.Boot)));
    }

    this.assertUniqueNames(nodes);
    nodes.sort((l, r) => NODE_KIND_ORDER.indexOf(l.kind) - NODE_KIND_ORDER.indexOf(r.kind));

    const runConfigs = new Map<string, RunConfigEntry>();
    for (const node of nodes) {
      const key = runConfigKey(node.team, node.kind);
      if (!runConfigs.has(key)) {
        runConfigs.set(key, await this.loadRunConfig(node.team, node.kind, sources));
      }
    }

    this.logger.debug(
      `Loaded desired state: ${nodes.length} node(s), ${runConfigs.size} run config(s) from ${sources.networkConfigDirectory}`,
    );
    return new DesiredState(nodes, runConfigs, sources);
  }

  private openBackend(directory: string): JsonFileStorageBackend {
    try {
      return new JsonFileStorageBackend(directory);
    } catch (error) {
      throw new ConfigurationError(`network config directory not found: ${directory}`, error);
    }
  }

  private async readNodeList(backend: JsonFileStorageBackend, file: string, forcedKind?: NodeKind): Promise<NodeSpec[]> {
    let data: unknown;
    try {
      data = await backend.readObject(file);
    } catch (error) {
      throw new ConfigurationError(`unable to read ${PathEx.join(backend.basePath, file)}`, error);
    }

    if (!Array.isArray(data)) {
      throw new ConfigurationError(`${file} must contain a list of nodes`);
    }

    const nodes: NodeSpec[] = [];
    const violations: string[] = [];
    for (const [index, entry] of data.entries()) {
      if (typeof entry !== 'object' || entry === null) {
        violations.push(`${file}[${index}]: entry must be an object`);
        continue;
      }

      const node: NodeSpec = this.mapper.fromObject(NodeSpec, entry);
      if (forcedKind) {
        node.kind = forcedKind;
      }

      try {
        node.validate();
        nodes.push(node);
      } catch (error) {
        violations.push(`${file}[${index}]: ${DeployNetError.messageOf(error)}`);
      }
    }

    if (violations.length > 0) {
      throw new ConfigurationError(`invalid node metadata:\n${violations.join('\n')}`, undefined, {violations});
    }

    return nodes;
  }

  private assertUniqueNames(nodes: NodeSpec[]): void {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const node of nodes) {
      if (seen.has(node.nodeName)) {
        duplicates.add(node.nodeName);
      }
      seen.add(node.nodeName);
    }

    if (duplicates.size > 0) {
      throw new ConfigurationError(`duplicate node_name: ${[...duplicates].join(', ')}`);
    }
  }

  private runConfigCandidates(team: string, kind: NodeKind, sources: DesiredStateSources): RunConfigCandidate[] {
    const teamDirectory = PathEx.join(sources.validatorsDirectory, team);
    if (kind === NodeKind.Boot) {
      return [
        {directory: teamDirectory, file: constants.BOOT_RUN_CONFIG_FILE},
        {directory: PathEx.join(sources.bootNodesDirectory, team), file: constants.BOOT_NODE_RUN_CONFIG_FILE},
      ];
    }

    return constants.VALIDATOR_RUN_CONFIG_FILES.map(file => ({directory: teamDirectory, file}));
  }

  private async loadRunConfig(team: string, kind: NodeKind, sources: DesiredStateSources): Promise<RunConfigEntry> {
    const candidates = this.runConfigCandidates(team, kind, sources);
    try {
      for (const {directory, file} of candidates) {
        const backend = this.openRunConfigDirectory(directory);
        if (backend && (await backend.exists(file))) {
          return await this.readRunConfig(backend, file);
        }
      }

      throw new MissingRunConfigError(
        team,
        kind,
        candidates.map(({directory, file}) => PathEx.join(directory, file)),
      );
    } catch (error) {
      const configurationError =
        error instanceof ConfigurationError
          ? error
          : new ConfigurationError(`unable to load ${kind} run config for team '${team}'`, error);
      this.logger.warn(configurationError.message);
      return configurationError;
    }
  }

  private openRunConfigDirectory(directory: string): YamlFileStorageBackend | undefined {
    try {
      return new YamlFileStorageBackend(directory);
    } catch (error) {
      if (error instanceof StorageBackendError) {
        this.logger.debug(`run config directory not usable: ${directory}`);
        return undefined;
      }
      throw error;
    }
  }

  private async readRunConfig(backend: YamlFileStorageBackend, file: string): Promise<RunConfig> {
    const path = PathEx.join(backend.basePath, file);
    const data: unknown = await backend.readObject(file);
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new ConfigurationError(`run config ${path} must be a mapping`);
    }

    const missing = RunConfig.REQUIRED_KEYS.filter(key => !(key in data));
    if (missing.length > 0) {
      throw new ConfigurationError(`run config ${path} is missing required key(s): ${missing.join(', ')}`, undefined, {
        path,
        missing,
      });
    }

    const runConfig: RunConfig = this.mapper.fromObject(RunConfig, data);
    try {
      runConfig.validate();
    } catch (error) {
      throw new ConfigurationError(`run config ${path} is invalid: ${DeployNetError.messageOf(error)}`, error, {path});
    }

    this.logger.debug(`Loaded run config ${path}`);
    return runConfig;
  }
}
