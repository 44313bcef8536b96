// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import {InfrastructureReconciler, toLabelValue} from '../../../../src/core/infra/infrastructure-reconciler.js';
import {DesiredStateLoader} from '../../../../src/core/metadata/desired-state-loader.js';
import {type DesiredState} from '../../../../src/core/metadata/desired-state.js';
import {DeployedStateStore} from '../../../../src/core/state/deployed-state-store.js';
import {JsonFileStorageBackend} from '../../../../src/data/backend/impl/json-file-storage-backend.js';
import {ClassToObjectMapper} from '../../../../src/data/mapper/impl/class-to-object-mapper.js';
import {DeployedStateSchema} from '../../../../src/data/schema/migration/impl/state/deployed-state-schema.js';
import {InstanceStatus} from '../../../../src/integration/cloud/resources/instance/instance.js';
import {ResultStatus} from '../../../../src/core/results/node-result.js';
import {PathEx} from '../../../../src/core/util/path-ex.js';
import {createTemporaryDirectory, RecordingLogger, removeTemporaryDirectory} from '../../../test-utility.js';
import {NetworkFixture} from '../../fixtures/network.fixture.js';
import {FakeCloudProvider} from '../../fixtures/fake-cloud-provider.fixture.js';

const PUBLIC_KEY = 'ssh-ed25519 AAAAtestkey tester';

describe('InfrastructureReconciler', () => {
  const mapper = new ClassToObjectMapper();
  let root: string;
  let fixture: NetworkFixture;
  let logger: RecordingLogger;
  let store: DeployedStateStore;
  let cloud: FakeCloudProvider;
  let delays: number[];

  beforeEach(() => {
    root = createTemporaryDirectory();
    fixture = new NetworkFixture(root).standard();
    logger = new RecordingLogger();
    fs.mkdirSync(PathEx.join(root, 'state'));
    store = new DeployedStateStore(
      new JsonFileStorageBackend(PathEx.join(root, 'state')),
      'state.json',
      new DeployedStateSchema(mapper),
      mapper,
      logger,
    );
    cloud = new FakeCloudProvider();
    cloud.ipPool.push('10.0.0.1', '10.0.0.2', '10.0.0.3');
    delays = [];
  });

  afterEach(() => {
    removeTemporaryDirectory(root);
  });

  function reconciler(concurrency = 1): InfrastructureReconciler {
    return new InfrastructureReconciler(cloud, store, logger, {
      resourcePrefix: 'deploynet',
      concurrency,
      ipPollPolicy: {maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 15},
      sleeper: async millis => {
        delays.push(millis);
      },
    });
  }

  function load(): Promise<DesiredState> {
    return new DesiredStateLoader(logger, mapper).load(fixture.sources);
  }

  describe('reconcileNodes', () => {
    it('creates instances and data disks, boot nodes first, and caches the IPs', async () => {
      const results = await reconciler().reconcileNodes(await load());

      expect(results).to.deep.equal([
        {target: 'boot-b', stage: 'infra', status: ResultStatus.Ok, reason: 'ip 10.0.0.1'},
        {target: 'val-one', stage: 'infra', status: ResultStatus.Ok, reason: 'ip 10.0.0.2'},
        {target: 'val-two', stage: 'infra', status: ResultStatus.Ok, reason: 'ip 10.0.0.3'},
      ]);
      expect(cloud.calls).to.deep.equal([
        'create-instance boot-b',
        'create-instance val-one',
        'create-disk val-one-db',
        'attach-disk val-one/val-one-db',
        'create-instance val-two',
        'create-disk val-two-db',
        'attach-disk val-two/val-two-db',
      ]);

      const instance = cloud.instanceMap.get('val-two');
      expect(instance?.tags).to.deep.equal(['validator']);
      expect(instance?.labels).to.deep.equal({
        'deploynet-managed': 'true',
        'deploynet-team': 'beta',
        'deploynet-node': 'val-two',
      });
      expect(cloud.instanceMap.get('boot-b')?.tags).to.deep.equal(['boot']);
      expect(cloud.diskMap.get('val-one-db')?.sizeGb).to.equal(20);

      expect(store.get('val-one')?.address).to.equal('0x1001');
      expect(store.getIp('val-two')).to.equal('10.0.0.3');
    });

    it('starts with the boot wave when validators run concurrently', async () => {
      await reconciler(0).reconcileNodes(await load());

      expect(cloud.callsOf('create-instance')[0]).to.equal('create-instance boot-b');
      expect(cloud.callsOf('create-instance')).to.have.lengthOf(3);
    });

    it('changes nothing on a second run', async () => {
      const desired = await load();
      const first = await reconciler().reconcileNodes(desired);
      const calls = [...cloud.calls];

      const second = await reconciler().reconcileNodes(desired);

      expect(second).to.deep.equal(first);
      expect(cloud.calls).to.deep.equal(calls);
    });

    it('repairs an existing instance and keeps a differently sized disk', async () => {
      cloud.addInstance({
        name: 'val-one',
        status: InstanceStatus.Terminated,
        hasExternalAccess: false,
        ip: '10.0.0.9',
      });
      cloud.diskMap.set('val-one-db', {name: 'val-one-db', sizeGb: 30, users: ['val-one']});

      const results = await reconciler().reconcileNodes(await load());

      expect(cloud.calls.filter(call => call.endsWith(' val-one') || call.includes('val-one/'))).to.deep.equal([
        'add-tags val-one',
        'start-instance val-one',
        'add-external-access val-one',
      ]);
      expect(cloud.instanceMap.get('val-one')?.tags).to.deep.equal(['validator']);
      expect(results[1].reason).to.equal('ip 10.0.0.9');
      expect(logger.entries.filter(entry => entry.level === 'warn')).to.deep.equal([
        {
          level: 'warn',
          message: 'Disk val-one-db is 30GB, run config asks for 20GB; leaving it as is',
          context: {node: 'val-one', stage: 'infra'},
        },
      ]);
    });

    it('isolates a failing node from its siblings', async () => {
      cloud.failures.add('create-instance val-one');

      const results = await reconciler().reconcileNodes(await load());

      expect(results[1]).to.deep.equal({
        target: 'val-one',
        stage: 'infra',
        status: ResultStatus.Failed,
        reason: "failed to create-instance 'val-one'",
        errorKind: 'CloudApiError',
      });
      expect(results[0].status).to.equal(ResultStatus.Ok);
      expect(results[2]).to.deep.equal({target: 'val-two', stage: 'infra', status: ResultStatus.Ok, reason: 'ip 10.0.0.2'});
      expect(store.get('val-one')).to.be.undefined;
      expect(logger.entries.filter(entry => entry.level === 'error')).to.deep.equal([
        {level: 'error', message: 'Infra failed for val-one', context: {node: 'val-one', stage: 'infra'}},
      ]);
    });

    it('times out a node whose public IP never shows up', async () => {
      cloud.addInstance({name: 'boot-b', tags: ['boot'], ip: '10.0.0.8', pendingIpPolls: 5});

      const results = await reconciler().reconcileNodes(await load());

      expect(results[0]).to.deep.equal({
        target: 'boot-b',
        stage: 'infra',
        status: ResultStatus.Failed,
        reason: 'timed out waiting for public IP of boot-b after 3 attempts',
        errorKind: 'ProvisioningTimeoutError',
      });
      expect(delays).to.deep.equal([10, 15]);
      expect(results.slice(1).map(result => result.status)).to.deep.equal([ResultStatus.Ok, ResultStatus.Ok]);
    });

    it('fails only the team whose run config is missing', async () => {
      fs.rmSync(PathEx.join(fixture.sources.validatorsDirectory, 'beta', 'run.yaml'));

      const results = await reconciler().reconcileNodes(await load());

      expect(results[2].status).to.equal(ResultStatus.Failed);
      expect(results[2].errorKind).to.equal('MissingRunConfigError');
      expect(cloud.calls.some(call => call.includes('val-two'))).to.be.false;
    });
  });

  describe('reconcileAccess', () => {
    const p2pRule = {
      name: 'deploynet-p2p',
      description: 'p2p traffic between deploynet nodes',
      allowed: [
        {protocol: 'tcp', port: 30_333},
        {protocol: 'tcp', port: 30_334},
        {protocol: 'udp', port: 30_335},
      ],
      sourceTags: ['validator', 'boot'],
      sourceRanges: [],
      targetTags: ['validator', 'boot'],
    };

    it('creates the firewall rules and registers the key', async () => {
      const results = await reconciler().reconcileAccess(await load(), 'tester', PUBLIC_KEY);

      expect(results.map(result => [result.target, result.reason])).to.deep.equal([
        ['deploynet-p2p', 'created'],
        ['deploynet-ssh', 'created'],
        ['ssh-key', 'registered for tester'],
      ]);
      expect(cloud.ruleMap.get('deploynet-p2p')).to.deep.equal(p2pRule);
      expect(cloud.ruleMap.get('deploynet-ssh')?.allowed).to.deep.equal([{protocol: 'tcp', port: 22}]);
      expect(cloud.ruleMap.get('deploynet-ssh')?.sourceRanges).to.deep.equal(['0.0.0.0/0']);
    });

    it('reports everything up to date on a second run', async () => {
      const desired = await load();
      await reconciler().reconcileAccess(desired, 'tester', PUBLIC_KEY);
      const calls = [...cloud.calls];

      const results = await reconciler().reconcileAccess(desired, 'tester', PUBLIC_KEY);

      expect(results.map(result => result.reason)).to.deep.equal(['up to date', 'up to date', 'already registered']);
      expect(cloud.calls).to.deep.equal(calls);
    });

    it('only ever adds ports, tags and ranges to an existing rule', async () => {
      cloud.ruleMap.set('deploynet-p2p', {
        name: 'deploynet-p2p',
        allowed: [
          {protocol: 'tcp', port: 30_333},
          {protocol: 'tcp', port: 9000},
        ],
        sourceTags: ['validator'],
        sourceRanges: ['10.0.0.0/8'],
        targetTags: ['validator'],
      });

      const results = await reconciler().reconcileAccess(await load(), 'tester', PUBLIC_KEY);

      expect(results[0].reason).to.equal('updated');
      expect(cloud.ruleMap.get('deploynet-p2p')).to.deep.equal({
        ...p2pRule,
        allowed: [
          {protocol: 'tcp', port: 30_333},
          {protocol: 'tcp', port: 9000},
          {protocol: 'tcp', port: 30_334},
          {protocol: 'udp', port: 30_335},
        ],
        sourceRanges: ['10.0.0.0/8'],
      });
    });

    it('keeps going when one rule fails', async () => {
      cloud.failures.add('read-firewall deploynet-ssh');

      const results = await reconciler().reconcileAccess(await load(), 'tester', PUBLIC_KEY);

      expect(results.map(result => [result.target, result.status])).to.deep.equal([
        ['deploynet-p2p', ResultStatus.Ok],
        ['deploynet-ssh', ResultStatus.Failed],
        ['ssh-key', ResultStatus.Ok],
      ]);
      expect(results[1].reason).to.equal("failed to read-firewall 'deploynet-ssh'");
    });
  });

  it('turns team names into label values', () => {
    expect(toLabelValue('Team.Alpha')).to.equal('team-alpha');
  });
});
