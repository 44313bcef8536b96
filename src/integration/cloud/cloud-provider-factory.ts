// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type NetLogger} from '../../core/logging/net-logger.js';
import {type CloudProvider, type CloudSettings} from './cloud-provider.js';
import {GcpCloudProvider} from './gcp-client/gcp-cloud-provider.js';
import {ProviderName} from './provider-name.js';
import {ConfigurationError} from '../../core/errors/configuration-error.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {PathEx} from '../../core/util/path-ex.js';

export type CloudProviderBuilder = (settings: CloudSettings, logger: NetLogger) => CloudProvider;

/**
 * Registry of cloud providers keyed by `--provider`. Settings are checked before a provider is built so that a bad
 * project, zone or key file fails the command before any node is touched.
 */
@injectable()
export class CloudProviderFactory {
  private readonly builders = new Map<ProviderName, CloudProviderBuilder>([
    [ProviderName.Gcp, (settings, logger) => new GcpCloudProvider(settings, logger)],
  ]);

  public constructor(@inject(InjectTokens.NetLogger) private readonly logger: NetLogger) {
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
  }

  /** Replaces or adds the builder for a provider */
  public register(name: ProviderName, builder: CloudProviderBuilder): void {
    this.builders.set(name, builder);
  }

  public create(settings: CloudSettings): CloudProvider {
    const builder = this.builders.get(settings.provider);
    if (!builder) {
      throw new ConfigurationError(`unsupported cloud provider: ${settings.provider}`);
    }

    this.validate(settings);
    this.logger.debug(`Using ${settings.provider} provider for project ${settings.project}, zone ${settings.zone}`);
    return builder(settings, this.logger);
  }

  private validate(settings: CloudSettings): void {
    if (!settings.project) {
      throw new MissingArgumentError('--project is required (or set GCP_PROJECT)');
    }
    if (!settings.zone) {
      throw new MissingArgumentError('--zone is required (or set GCP_ZONE)');
    }

    if (settings.credentials) {
      const keyFile = PathEx.resolve(settings.credentials);
      if (!fs.existsSync(keyFile) || !fs.statSync(keyFile).isFile()) {
        throw new ConfigurationError(`credentials file not found: ${keyFile}`);
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(keyFile, 'utf8'));
      } catch (error) {
        throw new ConfigurationError(`credentials file is not valid JSON: ${keyFile}`, error);
      }
      if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) {
        throw new ConfigurationError(`credentials file has no 'type' field: ${keyFile}`);
      }
    }
  }
}
