import crypto, { type KeyObject } from 'crypto';

export function buildCanonicalPayload(obj: unknown): string {
  // Stable stringify by sorting object keys recursively
  return JSON.stringify(sortObj(obj));
}

function sortObj(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortObj);
  if (value && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    const out: Record<string, unknown> = {};
    for (const [key, child] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (child === undefined) continue;
      out[key] = sortObj(child);
    }
    return out;
  }
  return value;
}

export function signHash(hash: string, privateKey: KeyObject): string {
  return crypto
    .sign('sha256', Buffer.from(hash, 'utf8'), {
      key: privateKey,
      padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
      saltLength: crypto.constants.RSA_PSS_SALTLEN_MAX_SIGN,
    })
    .toString('hex');
}

export function verifyHashSignature(hash: string, signatureHex: string, publicKey: KeyObject): boolean {
  if (!/^[0-9a-f]+$/.test(signatureHex) || signatureHex.length % 2 !== 0) return false;
  try {
    return crypto.verify(
      'sha256',
      Buffer.from(hash, 'utf8'),
      {
        key: publicKey,
        padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
        saltLength: crypto.constants.RSA_PSS_SALTLEN_AUTO,
      },
      Buffer.from(signatureHex, 'hex'),
    );
  } catch {
    // malformed signature bytes are a failed verification, not an exception
    return false;
  }
}
