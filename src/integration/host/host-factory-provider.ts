// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type NetLogger} from '../../core/logging/net-logger.js';
import {type HostFactory, type HostSettings} from './host.js';
import {SshHostFactory} from './ssh/ssh-host-factory.js';

@injectable()
export class HostFactoryProvider {
  public constructor(@inject(InjectTokens.NetLogger) private readonly logger: NetLogger) {
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
  }

  public create(settings: HostSettings): HostFactory {
    return new SshHostFactory(settings, this.logger);
  }
}
