// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import {DeployedStateStore} from '../../../../src/core/state/deployed-state-store.js';
import {DeployedStateStoreFactory} from '../../../../src/core/state/deployed-state-store-factory.js';
import {JsonFileStorageBackend} from '../../../../src/data/backend/impl/json-file-storage-backend.js';
import {ClassToObjectMapper} from '../../../../src/data/mapper/impl/class-to-object-mapper.js';
import {DeployedStateSchema} from '../../../../src/data/schema/migration/impl/state/deployed-state-schema.js';
import {StateStoreError} from '../../../../src/core/errors/state-store-error.js';
import {PathEx} from '../../../../src/core/util/path-ex.js';
import {createTemporaryDirectory, RecordingLogger, removeTemporaryDirectory} from '../../../test-utility.js';

const KEY = 'state.json';

/** Fails at the rename step, after the temporary file was written */
class FailingRenameBackend extends JsonFileStorageBackend {
  protected override replaceFile(): void {
    throw new Error('disk full');
  }
}

describe('DeployedStateStore', () => {
  const mapper = new ClassToObjectMapper();
  const schema = new DeployedStateSchema(mapper);
  let directory: string;
  let logger: RecordingLogger;

  function storeOn(backend: JsonFileStorageBackend = new JsonFileStorageBackend(directory)): DeployedStateStore {
    return new DeployedStateStore(backend, KEY, schema, mapper, logger);
  }

  function readFile(): string {
    return fs.readFileSync(PathEx.join(directory, KEY), 'utf8');
  }

  function writeFile(content: string): void {
    fs.writeFileSync(PathEx.join(directory, KEY), content);
  }

  beforeEach(() => {
    directory = createTemporaryDirectory();
    logger = new RecordingLogger();
  });

  afterEach(() => {
    removeTemporaryDirectory(directory);
  });

  it('starts empty when there is no state file', async () => {
    const state = await storeOn().load();

    expect(state.validators).to.deep.equal({});
    expect(state.metadata.version).to.equal(1);
    expect(fs.existsSync(PathEx.join(directory, KEY))).to.be.false;
  });

  it('persists an upsert in the versioned document layout', async () => {
    await storeOn().upsert('val-one', {team: 'alpha', address: '0x1001', peerId: '12D3KooWOne', ip: '10.0.0.2'});

    const document: unknown = JSON.parse(readFile());
    expect(document).to.have.nested.property('metadata.version', 1);
    expect(document).to.have.nested.property('metadata.project', '');
    expect(document).to.have.nested.property('validators.val-one').that.deep.equals({
      node_name: 'val-one',
      team: 'alpha',
      address: '0x1001',
      peer_id: '12D3KooWOne',
      ip: '10.0.0.2',
    });

    const reloaded = storeOn();
    await reloaded.load();
    expect(reloaded.getIp('val-one')).to.equal('10.0.0.2');
  });

  it('merges the given fields into an existing entry', async () => {
    const store = storeOn();
    await store.upsert('val-one', {team: 'alpha', address: '0x1001'});
    const merged = await store.upsert('val-one', {ip: '10.0.0.7'});

    expect(merged.team).to.equal('alpha');
    expect(merged.address).to.equal('0x1001');
    expect(merged.ip).to.equal('10.0.0.7');
  });

  it('keeps every one of many concurrent upserts', async () => {
    const store = storeOn();
    await Promise.all(
      Array.from({length: 20}, (_, index) => store.upsert(`node-${index}`, {ip: `10.0.1.${index}`})),
    );

    const reloaded = storeOn();
    await reloaded.load();
    expect(reloaded.entries()).to.have.lengthOf(20);
    expect(reloaded.getIp('node-13')).to.equal('10.0.1.13');
  });

  it('leaves the previous file and memory untouched when a write fails', async () => {
    await storeOn().upsert('val-one', {ip: '10.0.0.2'});
    const before = readFile();

    const store = storeOn(new FailingRenameBackend(directory));
    await expect(store.upsert('val-two', {ip: '10.0.0.3'})).to.be.rejectedWith(
      StateStoreError,
      'unable to persist deployed state to state.json',
    );

    expect(readFile()).to.equal(before);
    expect(fs.readdirSync(directory)).to.deep.equal([KEY]);
    expect(store.get('val-two')).to.be.undefined;
    expect(store.getIp('val-one')).to.equal('10.0.0.2');
  });

  it('migrates the legacy flat map', async () => {
    writeFile(JSON.stringify({'val-one': {node_name: 'val-one', address: '0x1001'}}));

    const store = storeOn();
    const state = await store.load();

    expect(state.metadata.version).to.equal(1);
    expect(store.get('val-one')?.address).to.equal('0x1001');
    expect(store.get('val-one')?.team).to.equal('');
    expect(store.getIp('val-one')).to.be.undefined;
  });

  it('reads a newer version as far as it maps and warns', async () => {
    writeFile(
      JSON.stringify({
        metadata: {project: 'p', zone: 'z', generated_at: '2026-01-01T00:00:00.000Z', version: 5, owner: 'x'},
        validators: {'val-one': {node_name: 'val-one', ip: '10.0.0.2', extra: true}},
      }),
    );

    const store = storeOn();
    await store.load();

    expect(store.getIp('val-one')).to.equal('10.0.0.2');
    expect(logger.messages('warn')).to.deep.equal([
      'Deployed state state.json has version 5, newer than supported 1; reading it best-effort',
    ]);
  });

  it('treats a corrupt file as empty', async () => {
    writeFile('{"validators": ');

    const state = await storeOn().load();

    expect(state.validators).to.deep.equal({});
    expect(logger.messages('warn')).to.have.lengthOf(1);
    expect(logger.messages('warn')[0]).to.match(/^Deployed state state\.json is unreadable, ignoring it: /);
  });

  it('treats a JSON array as empty', async () => {
    writeFile('[]');

    await storeOn().load();

    expect(logger.messages('warn')).to.deep.equal(['Deployed state state.json is not a JSON object, ignoring it']);
  });

  it('removes entries and resets the file', async () => {
    const store = storeOn();
    expect(await store.reset()).to.be.false;

    await store.upsert('val-one', {ip: '10.0.0.2'});
    expect(await store.remove('val-one')).to.be.true;
    expect(await store.remove('val-one')).to.be.false;

    expect(await store.reset()).to.be.true;
    expect(fs.existsSync(PathEx.join(directory, KEY))).to.be.false;
    expect(store.entries()).to.deep.equal([]);
  });

  it('replaces every entry and records the cloud location', async () => {
    const store = storeOn();
    await store.upsert('stale', {ip: '10.0.0.9'});
    const fresh = await storeOn().load();
    expect(Object.keys(fresh.validators)).to.deep.equal(['stale']);

    await store.replaceAll([]);
    await store.setMetadata('test-project', 'test-zone-a');

    const document: unknown = JSON.parse(readFile());
    expect(document).to.have.nested.property('metadata.project', 'test-project');
    expect(document).to.have.nested.property('metadata.zone', 'test-zone-a');
    expect(document).to.have.property('validators').that.deep.equals({});
  });
});

describe('DeployedStateStoreFactory', () => {
  let directory: string;

  beforeEach(() => {
    directory = createTemporaryDirectory();
  });

  afterEach(() => {
    removeTemporaryDirectory(directory);
  });

  it('creates the state directory and shares one store per file', () => {
    const mapper = new ClassToObjectMapper();
    const factory = new DeployedStateStoreFactory(new DeployedStateSchema(mapper), mapper, new RecordingLogger());
    const stateFile = PathEx.join(directory, 'nested', 'deployed.json');

    const store = factory.forFile(stateFile);

    expect(store.key).to.equal('deployed.json');
    expect(fs.statSync(PathEx.join(directory, 'nested')).isDirectory()).to.be.true;
    expect(factory.forFile(stateFile)).to.equal(store);
  });
});
