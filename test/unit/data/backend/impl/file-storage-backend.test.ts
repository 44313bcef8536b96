// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {after, describe, it} from 'mocha';
import fs from 'node:fs';
import {FileStorageBackend} from '../../../../../src/data/backend/impl/file-storage-backend.js';
import {StorageOperation} from '../../../../../src/data/backend/api/storage-operation.js';
import {PathEx} from '../../../../../src/core/util/path-ex.js';
import {createTemporaryDirectory, removeTemporaryDirectory} from '../../../../test-utility.js';

describe('File Storage Backend', () => {
  const testName: string = 'file-storage-backend';
  const temporaryDirectory: string = createTemporaryDirectory();

  after(() => removeTemporaryDirectory(temporaryDirectory));

  it('test empty string constructor', () => {
    expect(() => {
      new FileStorageBackend('');
    }).to.throw('basePath must not be null, undefined or empty');
  });

  it('test path that does not exist', () => {
    expect(() => {
      new FileStorageBackend('/path/does/not/exist');
    }).to.throw('basePath must exist and be valid');
  });

  it('test path that is not a directory', () => {
    const temporaryFile: string = PathEx.join(temporaryDirectory, `${testName}-file.txt`);
    fs.writeFileSync(temporaryFile, 'test');
    expect(() => {
      new FileStorageBackend(temporaryFile);
    }).to.throw(`basePath must be a valid directory: ${temporaryFile}`);
  });

  it('test isSupported', () => {
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    expect(backend.isSupported(StorageOperation.List)).to.be.true;
    expect(backend.isSupported(StorageOperation.ReadBytes)).to.be.true;
    expect(backend.isSupported(StorageOperation.WriteBytes)).to.be.true;
    expect(backend.isSupported(StorageOperation.Delete)).to.be.true;
    expect(backend.isSupported(StorageOperation.ReadObject)).to.be.false;
  });

  it('test list on new temp directory that is empty', async () => {
    const emptyDirectory: string = createTemporaryDirectory();
    try {
      const backend: FileStorageBackend = new FileStorageBackend(emptyDirectory);
      expect(await backend.list()).to.deep.equal([]);
    } finally {
      removeTemporaryDirectory(emptyDirectory);
    }
  });

  it('test list skips directories', async () => {
    const directory: string = createTemporaryDirectory();
    try {
      fs.writeFileSync(PathEx.join(directory, 'a.json'), '{}');
      fs.mkdirSync(PathEx.join(directory, 'nested'));
      const backend: FileStorageBackend = new FileStorageBackend(directory);
      expect(await backend.list()).to.deep.equal(['a.json']);
    } finally {
      removeTemporaryDirectory(directory);
    }
  });

  it('test exists', async () => {
    const key: string = `${testName}-exists.txt`;
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    expect(await backend.exists(key)).to.be.false;
    fs.writeFileSync(PathEx.join(temporaryDirectory, key), 'test');
    expect(await backend.exists(key)).to.be.true;
  });

  it('test readBytes', async () => {
    const key: string = `${testName}-file2.txt`;
    fs.writeFileSync(PathEx.join(temporaryDirectory, key), 'test');
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    const data: Uint8Array = await backend.readBytes(key);
    expect(Buffer.from(data).toString('utf8')).to.equal('test');
  });

  it('test readBytes with empty key', async () => {
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.readBytes('')).to.be.rejectedWith('key must not be null, undefined or empty');
  });

  it('test readBytes with a key outside the base path', async () => {
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.readBytes('../escape.txt')).to.be.rejectedWith(
      'key must name a file directly inside the base path',
    );
  });

  it('test readBytes with non-existent file', async () => {
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.readBytes('non-existent-file.txt')).to.be.rejectedWith('error reading file');
  });

  it('test writeBytes replaces the file and leaves no temporary file behind', async () => {
    const directory: string = createTemporaryDirectory();
    try {
      const key: string = `${testName}-file3.txt`;
      const backend: FileStorageBackend = new FileStorageBackend(directory);
      await backend.writeBytes(key, Buffer.from('first', 'utf8'));
      await backend.writeBytes(key, Buffer.from('second', 'utf8'));
      expect(fs.readFileSync(PathEx.join(directory, key), 'utf8')).to.equal('second');
      expect(fs.readdirSync(directory)).to.deep.equal([key]);
    } finally {
      removeTemporaryDirectory(directory);
    }
  });

  it('test writeBytes with empty key', async () => {
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.writeBytes('', Buffer.from('test', 'utf8'))).to.be.rejectedWith(
      'key must not be null, undefined or empty',
    );
  });

  it('test writeBytes with a file that already exists as a directory', async () => {
    const key: string = `${testName}-file-dir`;
    fs.mkdirSync(PathEx.join(temporaryDirectory, key));
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.writeBytes(key, Buffer.from('test', 'utf8'))).to.be.rejectedWith('error writing file');
    expect(fs.readdirSync(temporaryDirectory).filter(entry => entry.endsWith('.tmp'))).to.deep.equal([]);
  });

  it('test delete', async () => {
    const key: string = `${testName}-file4.txt`;
    const temporaryFile: string = PathEx.join(temporaryDirectory, key);
    fs.writeFileSync(temporaryFile, 'test');
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await backend.delete(key);
    expect(fs.existsSync(temporaryFile)).to.be.false;
  });

  it('test delete with empty key', async () => {
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.delete('')).to.be.rejectedWith('key must not be null, undefined or empty');
  });

  it('test delete with non-existent file', async () => {
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.delete('non-existent-file.txt')).to.be.rejectedWith('file not found');
  });

  it('test delete with a directory as key', async () => {
    const key: string = `${testName}-file-dir2`;
    fs.mkdirSync(PathEx.join(temporaryDirectory, key));
    const backend: FileStorageBackend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.delete(key)).to.be.rejectedWith('path is not a file');
  });
});
