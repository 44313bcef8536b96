// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import {DeployCommand} from '../../../src/commands/deploy.js';
import {InfraCommand} from '../../../src/commands/infra.js';
import {AppCommand} from '../../../src/commands/app.js';
import {StageFailureError} from '../../../src/core/errors/stage-failure-error.js';
import {createTemporaryDirectory, removeTemporaryDirectory} from '../../test-utility.js';
import {NetworkFixture} from '../fixtures/network.fixture.js';
import {CommandHarness} from '../fixtures/command-harness.fixture.js';

const IPS = ['10.0.0.1', '10.0.0.2', '10.0.0.3'];

describe('network commands', () => {
  let root: string;
  let harness: CommandHarness;

  beforeEach(() => {
    root = createTemporaryDirectory();
    harness = new CommandHarness(new NetworkFixture(root).standard());
    harness.cloud.ipPool.push(...IPS);
    for (const ip of IPS) {
      harness.hosts.machine(ip);
    }
  });

  afterEach(() => {
    harness.dispose();
    removeTemporaryDirectory(root);
  });

  function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  function deployedIps(): Record<string, string> {
    const document: unknown = JSON.parse(fs.readFileSync(harness.stateFile, 'utf8'));
    const ips: Record<string, string> = {};
    if (isRecord(document) && isRecord(document.validators)) {
      for (const [name, entry] of Object.entries(document.validators)) {
        ips[name] = isRecord(entry) ? String(entry.ip) : '';
      }
    }
    return ips;
  }

  it('deploy provisions, caches and starts every node', async () => {
    await harness.run(new DeployCommand(), ['deploy', ...harness.commonArgs(), ...harness.sshArgs()]);

    expect(deployedIps()['boot-b']).to.equal('10.0.0.1');
    expect(Object.values(deployedIps()).sort()).to.deep.equal(IPS);
    expect(harness.cloud.ruleMap.has('deploynet-p2p')).to.be.true;
    expect(harness.cloud.sshKeyMap.get('tester')).to.have.lengthOf(1);
    for (const ip of IPS) {
      expect(harness.hosts.machine(ip).containers.size).to.equal(1);
    }
    expect(fs.existsSync(`${root}/keys/id_ed25519.pub`)).to.be.true;
  });

  it('infra leaves the hosts alone and app reuses the cached IPs', async () => {
    await harness.run(new InfraCommand(), ['infra', ...harness.commonArgs(), ...harness.sshArgs()]);

    expect(harness.hosts.connects).to.deep.equal([]);
    expect(Object.keys(deployedIps()).sort()).to.deep.equal(['boot-b', 'val-one', 'val-two']);

    const createdBefore = harness.cloud.callsOf('create-instance').length;
    await harness.run(new AppCommand(), ['app', ...harness.commonArgs(), ...harness.sshArgs(), '--network', 'devnet']);

    expect(harness.cloud.callsOf('create-instance')).to.have.lengthOf(createdBefore);
    expect(harness.hosts.machine('10.0.0.1').containers.get('boot-b')?.spec.image).to.equal('registry.test/boot:1.0');
  });

  it('app fails every node when no IP is known anywhere', async () => {
    await expect(
      harness.run(new AppCommand(), ['app', ...harness.commonArgs(), ...harness.sshArgs()]),
    ).to.be.rejectedWith(StageFailureError, 'app failed for 3 target(s): boot-b, val-one, val-two');

    expect(harness.hosts.connects).to.deep.equal([]);
  });
});
