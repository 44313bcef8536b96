// SPDX-License-Identifier: Apache-2.0

import yargs from 'yargs';
import sinon from 'sinon';
import {container} from 'tsyringe-neo';
import {InjectTokens} from '../../../src/core/dependency-injection/inject-tokens.js';
import {type Middlewares} from '../../../src/core/middlewares.js';
import {type CloudProviderFactory} from '../../../src/integration/cloud/cloud-provider-factory.js';
import {type HostFactoryProvider} from '../../../src/integration/host/host-factory-provider.js';
import {ProviderName} from '../../../src/integration/cloud/provider-name.js';
import {type BaseCommand} from '../../../src/commands/base.js';
import {PathEx} from '../../../src/core/util/path-ex.js';
import {RecordingLogger} from '../../test-utility.js';
import {resetForTest} from '../../test-container.js';
import {FakeCloudProvider} from './fake-cloud-provider.fixture.js';
import {FakeHostFactory} from './fake-host-factory.fixture.js';
import {type NetworkFixture} from './network.fixture.js';

/**
 * Wires a fresh container to an in-memory cloud and in-memory hosts and runs commands through yargs with the same
 * middlewares as the CLI.
 */
export class CommandHarness {
  public readonly logger = new RecordingLogger();
  public readonly cloud = new FakeCloudProvider();
  public readonly hosts = new FakeHostFactory();
  public readonly stateFile: string;

  public constructor(private readonly network: NetworkFixture) {
    this.stateFile = PathEx.join(network.root, 'state', 'state.json');
    resetForTest(PathEx.join(network.root, 'home'), this.logger);

    container.resolve<CloudProviderFactory>(InjectTokens.CloudProviderFactory).register(ProviderName.Gcp, () => this.cloud);
    sinon.stub(container.resolve<HostFactoryProvider>(InjectTokens.HostFactoryProvider), 'create').returns(this.hosts);
  }

  /** Flags every command needs to find its inputs, keep quiet and stay inside the fixture directory */
  public commonArgs(): string[] {
    const {sources, root} = this.network;
    return [
      '--project',
      'test-project',
      '--zone',
      'test-zone-a',
      '--network-config-dir',
      sources.networkConfigDirectory,
      '--validators-dir',
      sources.validatorsDirectory,
      '--boot-nodes-dir',
      sources.bootNodesDirectory,
      '--state-file',
      this.stateFile,
      '--quiet-mode',
    ];
  }

  public sshArgs(): string[] {
    return ['--ssh-user', 'tester', '--ssh-key', PathEx.join(this.network.root, 'keys', 'id_ed25519')];
  }

  public async run(command: BaseCommand, args: string[]): Promise<void> {
    const middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);
    await yargs(args)
      .command(command.getCommandDefinition())
      .strict()
      .exitProcess(false)
      .fail(false)
      .middleware([middlewares.setLoggerDevFlag(), middlewares.processArgumentsAndDisplayHeader()], false)
      .parseAsync();
  }

  public dispose(): void {
    sinon.restore();
  }
}
