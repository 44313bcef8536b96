// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {after, describe, it} from 'mocha';
import fs from 'node:fs';
import {JsonFileStorageBackend} from '../../../../../src/data/backend/impl/json-file-storage-backend.js';
import {StorageOperation} from '../../../../../src/data/backend/api/storage-operation.js';
import {PathEx} from '../../../../../src/core/util/path-ex.js';
import {createTemporaryDirectory, removeTemporaryDirectory} from '../../../../test-utility.js';

describe('JSON File Storage Backend', () => {
  const testName: string = 'json-file-storage-backend';
  const temporaryDirectory: string = createTemporaryDirectory();

  after(() => removeTemporaryDirectory(temporaryDirectory));

  it('test isSupported', () => {
    const backend: JsonFileStorageBackend = new JsonFileStorageBackend(temporaryDirectory);
    expect(backend.isSupported(StorageOperation.ReadObject)).to.be.true;
    expect(backend.isSupported(StorageOperation.WriteObject)).to.be.true;
    expect(backend.isSupported(StorageOperation.List)).to.be.true;
  });

  it('test writeObject writes indented json with a trailing newline', async () => {
    const key: string = `${testName}-file.json`;
    const backend: JsonFileStorageBackend = new JsonFileStorageBackend(temporaryDirectory);
    await backend.writeObject(key, {validators: {}});
    expect(fs.readFileSync(PathEx.join(temporaryDirectory, key), 'utf8')).to.equal('{\n  "validators": {}\n}\n');
    expect(await backend.readObject(key)).to.deep.equal({validators: {}});
  });

  it('test readObject with empty file', async () => {
    const key: string = `${testName}-file2.json`;
    fs.writeFileSync(PathEx.join(temporaryDirectory, key), '');
    const backend: JsonFileStorageBackend = new JsonFileStorageBackend(temporaryDirectory);
    await expect(backend.readObject(key)).to.be.rejectedWith('file is empty');
  });

  it('test readObject with invalid json file', async () => {
    const key: string = `${testName}-file3.json`;
    fs.writeFileSync(PathEx.join(temporaryDirectory, key), '{"validators": ');
    const backend: JsonFileStorageBackend = new JsonFileStorageBackend(temporaryDirectory);
    await expect(backend.readObject(key)).to.be.rejectedWith('error parsing json file');
  });
});
