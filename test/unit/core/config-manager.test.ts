// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {container} from 'tsyringe-neo';
import {ConfigManager} from '../../../src/core/config-manager.js';
import {Flags as flags} from '../../../src/commands/flags.js';
import {InjectTokens} from '../../../src/core/dependency-injection/inject-tokens.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../../src/core/errors/missing-argument-error.js';
import {type ArgvStruct} from '../../../src/types/aliases.js';
import {resetForTest} from '../../test-container.js';

describe('ConfigManager', () => {
  let configManager: ConfigManager;

  beforeEach(() => {
    resetForTest();
    configManager = container.resolve<ConfigManager>(InjectTokens.ConfigManager);
  });

  describe('update values using argv', () => {
    it('coerces flag values to their declared types', () => {
      configManager.update({_: ['infra'], project: 'test-project', concurrency: '4', 'quiet-mode': 'true'});

      expect(configManager.getFlag(flags.project)).to.equal('test-project');
      expect(configManager.getNumber(flags.concurrency)).to.equal(4);
      expect(configManager.getBoolean(flags.quiet)).to.be.true;
      expect(configManager.config.lastCommand).to.deep.equal(['infra']);
    });

    it('ignores keys that are not flags', () => {
      configManager.update({_: [], unknown: 'value'});

      expect(configManager.config.flags).to.deep.equal({});
    });

    it('rejects a value outside the flag choices', () => {
      expect(() => configManager.update({_: [], 'peer-address-format': 'carrier-pigeon'})).to.throw(
        IllegalArgumentError,
        "invalid value 'carrier-pigeon' for --peer-address-format, expected one of: multiaddr, ip, ip-port",
      );
    });

    it('rejects a number flag that is not a number', () => {
      expect(() => configManager.update({_: [], concurrency: 'many'})).to.throw(
        IllegalArgumentError,
        "invalid number value 'many' for --concurrency",
      );
    });
  });

  describe('applyPrecedence', () => {
    it('prefers argv, then cached values, then defaults', () => {
      configManager.setFlag(flags.project, 'cached-project');
      configManager.setFlag(flags.zone, 'cached-zone');
      const argv: ArgvStruct = {_: ['app'], zone: 'test-zone-b'};

      configManager.applyPrecedence(argv);

      expect(argv.project).to.equal('cached-project');
      expect(argv.zone).to.equal('test-zone-b');
      expect(argv.network).to.equal('testnet');
      expect(argv['state-file']).to.equal('.deployed-state.json');
    });
  });

  describe('typed getters', () => {
    it('treats an empty string as unset', () => {
      configManager.setFlag(flags.project, '');

      expect(configManager.getString(flags.project)).to.be.undefined;
      expect(() => configManager.getRequiredString(flags.project)).to.throw(
        MissingArgumentError,
        '--project is required',
      );
    });

    it('falls back to flag defaults', () => {
      expect(configManager.getNumber(flags.concurrency)).to.equal(0);
      expect(configManager.getBoolean(flags.quiet)).to.be.false;
      expect(configManager.getRequiredString(flags.resourcePrefix)).to.equal('deploynet');
    });
  });

  it('stringifies only the flags that differ from their defaults', () => {
    expect(flags.stringifyArgv({_: ['deploy'], prefix: 'deploynet', network: 'devnet', 'quiet-mode': true})).to.equal(
      '--network devnet --quiet-mode',
    );
  });
});
