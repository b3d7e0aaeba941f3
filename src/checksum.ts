/**
 * Jenkins lookup3 ("hashlittle"), the checksum of HDF5 metadata blocks
 */

function rot(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

function word(key: Uint8Array, at: number): number {
  return (key[at] | (key[at + 1] << 8) | (key[at + 2] << 16) | (key[at + 3] << 24)) >>> 0;
}

/**
 * Hash `key` with the given seed. The result is an unsigned 32-bit integer.
 */
export function lookup3(key: Uint8Array, initval: number = 0): number {
  let length = key.length;
  let a = (0xdeadbeef + length + initval) >>> 0;
  let b = a;
  let c = a;
  let offset = 0;

  while (length > 12) {
    a = (a + word(key, offset)) >>> 0;
    b = (b + word(key, offset + 4)) >>> 0;
    c = (c + word(key, offset + 8)) >>> 0;

    // mix
    a = (a - c) >>> 0; a = (a ^ rot(c, 4)) >>> 0; c = (c + b) >>> 0;
    b = (b - a) >>> 0; b = (b ^ rot(a, 6)) >>> 0; a = (a + c) >>> 0;
    c = (c - b) >>> 0; c = (c ^ rot(b, 8)) >>> 0; b = (b + a) >>> 0;
    a = (a - c) >>> 0; a = (a ^ rot(c, 16)) >>> 0; c = (c + b) >>> 0;
    b = (b - a) >>> 0; b = (b ^ rot(a, 19)) >>> 0; a = (a + c) >>> 0;
    c = (c - b) >>> 0; c = (c ^ rot(b, 4)) >>> 0; b = (b + a) >>> 0;

    length -= 12;
    offset += 12;
  }

  if (length === 0) {
    return c;
  }

  // the last 1..12 bytes feed a, b and c little-endian
  const tail = [0, 0, 0];
  for (let i = 0; i < length; i++) {
    tail[i >> 2] += key[offset + i] * 2 ** (8 * (i & 3));
  }
  a = (a + tail[0]) >>> 0;
  b = (b + tail[1]) >>> 0;
  c = (c + tail[2]) >>> 0;

  // final
  c = (c ^ b) >>> 0; c = (c - rot(b, 14)) >>> 0;
  a = (a ^ c) >>> 0; a = (a - rot(c, 11)) >>> 0;
  b = (b ^ a) >>> 0; b = (b - rot(a, 25)) >>> 0;
  c = (c ^ b) >>> 0; c = (c - rot(b, 16)) >>> 0;
  a = (a ^ c) >>> 0; a = (a - rot(c, 4)) >>> 0;
  b = (b ^ a) >>> 0; b = (b - rot(a, 14)) >>> 0;
  c = (c ^ b) >>> 0; c = (c - rot(b, 24)) >>> 0;

  return c;
}

/** Checksum of an HDF5 metadata block (lookup3 with seed 0) */
export function metadataChecksum(bytes: Uint8Array): number {
  return lookup3(bytes, 0);
}
