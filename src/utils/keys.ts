import crypto, { type KeyObject } from 'crypto';
import fs from 'fs';
import path from 'path';
import { SetupError } from '../core/errors.js';
import { getLogger } from './logging.js';

export const PRIVATE_KEY_FILE = 'audit_private_key.pem';
export const PUBLIC_KEY_FILE = 'audit_public_key.pem';

export interface SigningKeys {
  privateKey: KeyObject;
  publicKey: KeyObject;
}

export interface KeyPaths {
  privateKeyPath: string;
  publicKeyPath: string;
}

export function keyPaths(keyDir: string): KeyPaths {
  const dir = path.resolve(keyDir);
  return {
    privateKeyPath: path.join(dir, PRIVATE_KEY_FILE),
    publicKeyPath: path.join(dir, PUBLIC_KEY_FILE),
  };
}

/**
 * One-time RSA-2048 key pair generation. Never called from the record path:
 * a missing key there is a SetupError, not a trigger to mint a new identity.
 */
export function generateKeyPair(keyDir: string, opts: { force?: boolean } = {}): KeyPaths {
  const paths = keyPaths(keyDir);
  if (!opts.force && (fs.existsSync(paths.privateKeyPath) || fs.existsSync(paths.publicKeyPath))) {
    throw new SetupError(`Key pair already exists in ${path.dirname(paths.privateKeyPath)} (use --force to replace)`);
  }
  fs.mkdirSync(path.dirname(paths.privateKeyPath), { recursive: true, mode: 0o700 });
  const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicExponent: 0x10001,
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' },
  });
  fs.writeFileSync(paths.privateKeyPath, privateKey, { mode: 0o600 });
  fs.chmodSync(paths.privateKeyPath, 0o600);
  fs.writeFileSync(paths.publicKeyPath, publicKey, { mode: 0o644 });
  keyCache.delete(path.dirname(paths.privateKeyPath));
  getLogger().info({ keyDir: path.dirname(paths.privateKeyPath) }, 'signing key pair generated');
  return paths;
}

function readKeyFile(file: string, kind: 'private' | 'public'): string {
  if (!fs.existsSync(file)) {
    throw new SetupError(`Missing ${kind} key ${file}; run "ai-audit keygen" once to create the key pair`);
  }
  return fs.readFileSync(file, 'utf8');
}

export function loadPublicKey(keyDir: string): KeyObject {
  const { publicKeyPath } = keyPaths(keyDir);
  try {
    return crypto.createPublicKey(readKeyFile(publicKeyPath, 'public'));
  } catch (err) {
    if (err instanceof SetupError) throw err;
    throw new SetupError(`Unreadable public key ${publicKeyPath}`, err);
  }
}

const keyCache = new Map<string, SigningKeys>();

/** Loads (once per process and directory) the signing key pair. */
export function loadSigningKeys(keyDir: string): SigningKeys {
  const dir = path.resolve(keyDir);
  const cached = keyCache.get(dir);
  if (cached) return cached;
  const { privateKeyPath } = keyPaths(dir);
  let privateKey: KeyObject;
  try {
    privateKey = crypto.createPrivateKey(readKeyFile(privateKeyPath, 'private'));
  } catch (err) {
    if (err instanceof SetupError) throw err;
    throw new SetupError(`Unreadable private key ${privateKeyPath}`, err);
  }
  const keys: SigningKeys = { privateKey, publicKey: loadPublicKey(dir) };
  keyCache.set(dir, keys);
  return keys;
}

export function __resetKeyCacheForTests() {
  keyCache.clear();
}
