import { createHash } from 'node:crypto';

export const DEFAULT_FINGERPRINT_ALGORITHM = 'sha256';

export function fingerprint(bytes: Uint8Array, algorithm: string = DEFAULT_FINGERPRINT_ALGORITHM): Buffer {
  return createHash(algorithm).update(bytes).digest();
}

export function fingerprintHex(bytes: Uint8Array, algorithm: string = DEFAULT_FINGERPRINT_ALGORITHM): string {
  return fingerprint(bytes, algorithm).toString('hex');
}

export function fingerprintsMatch(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (!a || !b) {
    return false;
  }

  return Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(b);
}
