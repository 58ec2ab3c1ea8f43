import { randomBytes } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { generateKeyPairFromSeed } from '@libp2p/crypto/keys';
import type { Ed25519PrivateKey } from '@libp2p/interface';
import { peerIdFromPrivateKey } from '@libp2p/peer-id';
import { IdentityError } from '../errors';
import type { Logger } from '../logger';

/** Name of the key file inside the storage directory */
export const IDENTITY_KEY_FILE = 'xplorer-identity.key';

/** Bytes in a node secret key (an Ed25519 seed) */
export const SECRET_KEY_LENGTH = 32;

/**
 * Default storage directory: ~/.xplorer/p2p
 */
export function getDefaultStoragePath(): string {
  return resolve(homedir(), '.xplorer', 'p2p');
}

export function generateSecretKey(): Uint8Array {
  return new Uint8Array(randomBytes(SECRET_KEY_LENGTH));
}

/**
 * @throws IdentityError INVALID_KEY_LENGTH unless the key is 32 bytes
 */
export function assertSecretKey(key: Uint8Array): void {
  if (key.byteLength !== SECRET_KEY_LENGTH) {
    throw new IdentityError(
      'INVALID_KEY_LENGTH',
      `Secret key must be ${SECRET_KEY_LENGTH} bytes, got ${key.byteLength}`
    );
  }
}

/**
 * The libp2p private key a secret key stands for.
 */
export async function privateKeyFromSecret(secret: Uint8Array): Promise<Ed25519PrivateKey> {
  assertSecretKey(secret);
  return generateKeyPairFromSeed('Ed25519', secret);
}

/**
 * The public node id (peer id) a secret key stands for.
 */
export async function nodeIdFromSecret(secret: Uint8Array): Promise<string> {
  return peerIdFromPrivateKey(await privateKeyFromSecret(secret)).toString();
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Reads and writes the node secret key under a storage directory.
 */
export class IdentityStore {
  readonly storagePath: string;
  private readonly logger: Logger | null;

  constructor(storagePath: string = getDefaultStoragePath(), logger?: Logger) {
    this.storagePath = resolve(storagePath);
    this.logger = logger ?? null;
  }

  get keyPath(): string {
    return join(this.storagePath, IDENTITY_KEY_FILE);
  }

  /**
   * The stored key, or null when there is none. A key file of the wrong
   * size is treated as absent.
   */
  async load(): Promise<Uint8Array | null> {
    let data: Buffer;
    try {
      data = await readFile(this.keyPath);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) {
        return null;
      }
      throw err;
    }

    if (data.byteLength !== SECRET_KEY_LENGTH) {
      this.logger?.warn(`Ignoring corrupt identity key at ${this.keyPath} (${data.byteLength} bytes)`);
      return null;
    }
    return new Uint8Array(data);
  }

  /**
   * Write the key atomically, readable by the owner only.
   */
  async save(key: Uint8Array): Promise<void> {
    assertSecretKey(key);
    await mkdir(this.storagePath, { recursive: true, mode: 0o700 });
    const tmpPath = `${this.keyPath}.${process.pid}.tmp`;
    await writeFile(tmpPath, key, { mode: 0o600 });
    await rename(tmpPath, this.keyPath);
  }

  /**
   * Remove everything in the storage directory, the key file included.
   */
  async clear(): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(this.storagePath);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) {
        return;
      }
      throw err;
    }
    await Promise.all(entries.map((entry) => rm(join(this.storagePath, entry), { recursive: true, force: true })));
  }

  /**
   * Load the stored key, or create and persist a new one.
   * With `forceNew`, any stored key is replaced.
   */
  async loadOrCreate(forceNew = false): Promise<Uint8Array> {
    if (!forceNew) {
      const existing = await this.load();
      if (existing) {
        this.logger?.debug(`Loaded identity from ${this.keyPath}`);
        return existing;
      }
    }
    const key = generateSecretKey();
    await this.save(key);
    this.logger?.info(`Created new identity at ${this.keyPath}`);
    return key;
  }
}
