// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {
  labelFilter,
  toAllowed,
  toDisk,
  toFirewallResource,
  toFirewallRule,
  toInstance,
  toTransportPorts,
} from '../../../../../src/integration/cloud/gcp-client/gcp-resource-mapper.js';
import {InstanceStatus} from '../../../../../src/integration/cloud/resources/instance/instance.js';

describe('gcp resource mapper', () => {
  it('maps an instance with its disks and external IP', () => {
    const instance = toInstance({
      name: 'val-one',
      status: 'TERMINATED',
      tags: {items: ['validator']},
      labels: {'deploynet-node': 'val-one'},
      disks: [
        {source: 'https://compute.test/projects/p/zones/z/disks/val-one-boot'},
        {deviceName: 'val-one-db'},
      ],
      networkInterfaces: [{accessConfigs: [{name: 'External NAT', natIP: '10.0.0.2'}]}],
    });

    expect(instance).to.deep.equal({
      name: 'val-one',
      status: InstanceStatus.Terminated,
      tags: ['validator'],
      labels: {'deploynet-node': 'val-one'},
      attachedDisks: ['val-one-boot', 'val-one-db'],
      hasExternalAccess: true,
      publicIp: '10.0.0.2',
    });
  });

  it('maps an unknown status and a missing access config', () => {
    const instance = toInstance({name: 'boot-b', status: 'REPAIRING', networkInterfaces: [{}]});

    expect(instance.status).to.equal(InstanceStatus.Unknown);
    expect(instance.hasExternalAccess).to.be.false;
    expect(instance.publicIp).to.be.undefined;
    expect(instance.attachedDisks).to.deep.equal([]);
  });

  it('maps disk users to instance names', () => {
    expect(
      toDisk({name: 'val-one-db', sizeGb: '20', users: ['https://compute.test/projects/p/zones/z/instances/val-one']}),
    ).to.deep.equal({name: 'val-one-db', sizeGb: 20, users: ['val-one']});
  });

  it('expands port ranges and skips other protocols', () => {
    expect(
      toTransportPorts([
        {IPProtocol: 'tcp', ports: ['22', '30000-30002']},
        {IPProtocol: 'icmp'},
        {IPProtocol: 'udp'},
      ]),
    ).to.deep.equal([
      {protocol: 'tcp', port: 22},
      {protocol: 'tcp', port: 30_000},
      {protocol: 'tcp', port: 30_001},
      {protocol: 'tcp', port: 30_002},
    ]);
  });

  it('groups ports into one allow entry per protocol', () => {
    expect(
      toAllowed([
        {protocol: 'udp', port: 30_335},
        {protocol: 'tcp', port: 30_334},
        {protocol: 'tcp', port: 30_333},
        {protocol: 'tcp', port: 30_334},
      ]),
    ).to.deep.equal([
      {IPProtocol: 'tcp', ports: ['30333', '30334']},
      {IPProtocol: 'udp', ports: ['30335']},
    ]);
  });

  it('writes an ingress rule on the default network and reads it back', () => {
    const rule = {
      name: 'deploynet-ssh',
      description: 'ssh access to deploynet nodes',
      allowed: [{protocol: 'tcp' as const, port: 22}],
      sourceTags: [],
      sourceRanges: ['0.0.0.0/0'],
      targetTags: ['validator', 'boot'],
    };

    const resource = toFirewallResource(rule);

    expect(resource).to.deep.equal({
      name: 'deploynet-ssh',
      description: 'ssh access to deploynet nodes',
      network: 'global/networks/default',
      direction: 'INGRESS',
      allowed: [{IPProtocol: 'tcp', ports: ['22']}],
      sourceTags: undefined,
      sourceRanges: ['0.0.0.0/0'],
      targetTags: ['validator', 'boot'],
    });
    expect(toFirewallRule(resource)).to.deep.equal(rule);
  });

  it('builds a list filter from labels', () => {
    expect(labelFilter({'deploynet-managed': 'true', 'deploynet-team': 'alpha'})).to.equal(
      '(labels.deploynet-managed = "true") (labels.deploynet-team = "alpha")',
    );
  });
});
