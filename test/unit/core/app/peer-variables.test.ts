// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {nodeVariables, peersOf} from '../../../../src/core/app/peer-variables.js';
import {PeerAddressPolicies} from '../../../../src/core/app/peer-address-policy.js';
import {PeerAddressFormat} from '../../../../src/core/app/peer-address-format.js';
import {DesiredState, runConfigKey, type RunConfigEntry} from '../../../../src/core/metadata/desired-state.js';
import {NodeSpec} from '../../../../src/core/metadata/node-spec.js';
import {RunConfig} from '../../../../src/core/metadata/run-config.js';
import {NodeKind} from '../../../../src/core/metadata/node-kind.js';
import {TemplateRenderer} from '../../../../src/core/templates/template-renderer.js';
import {PlaceholderSets} from '../../../../src/core/templates/placeholder-sets.js';
import {ConfigurationError} from '../../../../src/core/errors/configuration-error.js';

const BOOT = new NodeSpec('alpha', 'boot-b', '0xB1', '12D3KooWBoot', ['/ip4/0.0.0.0/tcp/30333'], NodeKind.Boot);
const ONE = new NodeSpec('alpha', 'val-one', '0x1001', '12D3KooWOne', [
  '/ip4/0.0.0.0/tcp/30334',
  '/ip4/0.0.0.0/udp/30335/quic-v1',
]);
const TWO = new NodeSpec('beta', 'val-two', '0x1002', '12D3KooWTwo', ['/ip4/0.0.0.0/tcp/30334']);

const IPS: Record<string, string> = {'boot-b': '10.0.0.1', 'val-one': '10.0.0.2', 'val-two': '10.0.0.3'};

function runConfig(image: string, cmd: string[]): RunConfig {
  const config = new RunConfig();
  config.image = image;
  config.dataDir = '/data';
  config.cmd = cmd;
  return config;
}

function desiredState(nodes: NodeSpec[]): DesiredState {
  const validatorConfig = runConfig('registry.test/node:1.0', [
    'node',
    '--name={{node_name}}',
    '--bootstrap={{bootstrap_addrs}}',
    '--validators={{validator_addrs}}',
  ]);
  const runConfigs = new Map<string, RunConfigEntry>([
    [runConfigKey('alpha', NodeKind.Validator), validatorConfig],
    [runConfigKey('beta', NodeKind.Validator), validatorConfig],
    [runConfigKey('alpha', NodeKind.Boot), runConfig('registry.test/boot:1.0', ['boot', '--peers={{peer_addrs}}'])],
  ]);
  return new DesiredState(nodes, runConfigs, {
    networkConfigDirectory: '/unused/network-config',
    validatorsDirectory: '/unused/validators',
    bootNodesDirectory: '/unused/boot_nodes',
  });
}

const ipOf = async (node: NodeSpec): Promise<string> => IPS[node.nodeName];

describe('peer variables', () => {
  const desired = desiredState([BOOT, ONE, TWO]);
  const multiaddr = PeerAddressPolicies.of(PeerAddressFormat.Multiaddr);

  it('bootstraps validators from the boot nodes', () => {
    expect(peersOf(ONE, desired).map(node => node.nodeName)).to.deep.equal(['boot-b']);
  });

  it('bootstraps a lone boot node from the validators', () => {
    expect(peersOf(BOOT, desired).map(node => node.nodeName)).to.deep.equal(['val-one', 'val-two']);
  });

  it('falls back to the other validators without boot nodes', () => {
    expect(peersOf(ONE, desiredState([ONE, TWO])).map(node => node.nodeName)).to.deep.equal(['val-two']);
  });

  it('renders a validator command with multiaddr peers', async () => {
    const variables = await nodeVariables(ONE, desired, desired.runConfigFor(ONE), 'devnet', multiaddr, ipOf);
    const rendered = new TemplateRenderer().render(
      desired.runConfigFor(ONE).cmd,
      variables,
      PlaceholderSets.forKind(NodeKind.Validator),
    );

    expect(variables.listen_addresses).to.equal('/ip4/0.0.0.0/tcp/30334,/ip4/0.0.0.0/udp/30335/quic-v1');
    expect(rendered).to.deep.equal([
      'node',
      '--name=val-one',
      '--bootstrap=/ip4/10.0.0.1/tcp/30333/p2p/12D3KooWBoot',
      '--validators=0x1002',
    ]);
  });

  it('renders a boot node command without validator_addrs', async () => {
    const variables = await nodeVariables(BOOT, desired, desired.runConfigFor(BOOT), 'devnet', multiaddr, ipOf);

    expect(variables.peer_addrs).to.equal(
      '/ip4/10.0.0.2/tcp/30334/p2p/12D3KooWOne,/ip4/10.0.0.3/tcp/30334/p2p/12D3KooWTwo',
    );
    expect(variables.network).to.equal('devnet');
    expect(variables).not.to.have.property('validator_addrs');
  });

  it('writes plain and port-qualified IPs for the other formats', async () => {
    const config = desired.runConfigFor(ONE);
    const ip = await nodeVariables(ONE, desired, config, 'devnet', PeerAddressPolicies.of(PeerAddressFormat.Ip), ipOf);
    const ipPort = await nodeVariables(
      BOOT,
      desired,
      desired.runConfigFor(BOOT),
      'devnet',
      PeerAddressPolicies.of(PeerAddressFormat.IpPort),
      ipOf,
    );

    expect(ip.bootstrap_addrs).to.equal('10.0.0.1');
    expect(ipPort.peer_addrs).to.equal('10.0.0.2:30334,10.0.0.3:30334');
  });

  it('rejects ip-port for a peer without a port', () => {
    const portless = new NodeSpec('alpha', 'odd', '0x9', '12D3KooWOdd', ['/ip4/0.0.0.0']);

    expect(() => PeerAddressPolicies.of(PeerAddressFormat.IpPort).address(portless, '10.0.0.9')).to.throw(
      ConfigurationError,
      "node 'odd' has no listen address with a tcp or udp port",
    );
  });
});
