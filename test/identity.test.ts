import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { IdentityError } from '../src/errors.js';
import {
  IDENTITY_KEY_FILE,
  IdentityStore,
  SECRET_KEY_LENGTH,
  generateSecretKey,
  nodeIdFromSecret,
} from '../src/p2p/identity.js';
import { P2PTransportAdapter } from '../src/p2p/adapter.js';

function isIdentityError(code: string) {
  return (err: unknown) => err instanceof IdentityError && err.code === code;
}

describe('identity', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'xplorer-identity-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('IdentityStore', () => {
    it('should load nothing from an empty directory', async () => {
      const store = new IdentityStore(join(dir, 'missing'));
      assert.strictEqual(await store.load(), null);
    });

    it('should create a 32 byte key readable by the owner only', async () => {
      const store = new IdentityStore(join(dir, 'p2p'));
      const key = await store.loadOrCreate();

      assert.strictEqual(key.byteLength, SECRET_KEY_LENGTH);
      assert.strictEqual(store.keyPath, join(dir, 'p2p', IDENTITY_KEY_FILE));
      assert.strictEqual((await stat(store.keyPath)).mode & 0o777, 0o600);
      assert.deepStrictEqual([...(await readFile(store.keyPath))], [...key]);
    });

    it('should return the same key on later loads', async () => {
      const store = new IdentityStore(dir);
      const first = await store.loadOrCreate();
      const second = await new IdentityStore(dir).loadOrCreate();
      assert.deepStrictEqual(second, first);
    });

    it('should replace the key when forced', async () => {
      const store = new IdentityStore(dir);
      const first = await store.loadOrCreate();
      const second = await store.loadOrCreate(true);
      assert.notDeepStrictEqual(second, first);
      assert.deepStrictEqual(await store.load(), second);
    });

    it('should treat a key file of the wrong size as absent', async () => {
      await writeFile(join(dir, IDENTITY_KEY_FILE), new Uint8Array(16));
      const store = new IdentityStore(dir);
      assert.strictEqual(await store.load(), null);

      const key = await store.loadOrCreate();
      assert.strictEqual(key.byteLength, SECRET_KEY_LENGTH);
    });

    it('should refuse to save a key of the wrong size', async () => {
      const store = new IdentityStore(dir);
      await assert.rejects(store.save(new Uint8Array(31)), isIdentityError('INVALID_KEY_LENGTH'));
    });

    it('should clear every entry in the directory', async () => {
      const store = new IdentityStore(dir);
      await store.loadOrCreate();
      await writeFile(join(dir, 'peers.json'), '{}');

      await store.clear();
      assert.deepStrictEqual(await readdir(dir), []);
      assert.strictEqual(await store.load(), null);
    });
  });

  describe('nodeIdFromSecret', () => {
    it('should derive a stable Ed25519 peer id', async () => {
      const key = new Uint8Array(SECRET_KEY_LENGTH).fill(7);
      const nodeId = await nodeIdFromSecret(key);
      assert.ok(nodeId.startsWith('12D3KooW'), nodeId);
      assert.strictEqual(await nodeIdFromSecret(new Uint8Array(key)), nodeId);
      assert.notStrictEqual(await nodeIdFromSecret(generateSecretKey()), nodeId);
    });

    it('should reject a key of the wrong size', async () => {
      await assert.rejects(nodeIdFromSecret(new Uint8Array(8)), isIdentityError('INVALID_KEY_LENGTH'));
    });
  });

  describe('P2PTransportAdapter identity management', () => {
    it('should export nothing before an identity exists', async () => {
      const adapter = new P2PTransportAdapter({ storagePath: dir });
      assert.strictEqual(await adapter.exportSecretKey(), null);
    });

    it('should import a key and export it back', async () => {
      const adapter = new P2PTransportAdapter({ storagePath: dir });
      await writeFile(join(dir, 'stale.txt'), 'old');
      const key = generateSecretKey();

      await adapter.importSecretKey(key);
      assert.deepStrictEqual(await adapter.exportSecretKey(), key);
      assert.deepStrictEqual(await readdir(dir), [IDENTITY_KEY_FILE]);
    });

    it('should reject an imported key of the wrong size', async () => {
      const adapter = new P2PTransportAdapter({ storagePath: dir });
      await assert.rejects(adapter.importSecretKey(new Uint8Array(33)), isIdentityError('INVALID_KEY_LENGTH'));
      assert.strictEqual(await adapter.exportSecretKey(), null);
    });

    it('should reset to a new persisted identity', async () => {
      const adapter = new P2PTransportAdapter({ storagePath: dir });
      const old = generateSecretKey();
      await adapter.importSecretKey(old);

      const nodeId = await adapter.resetIdentity();
      const stored = await adapter.exportSecretKey();
      assert.ok(stored);
      assert.notDeepStrictEqual(stored, old);
      assert.strictEqual(await nodeIdFromSecret(stored), nodeId);
    });
  });
});
