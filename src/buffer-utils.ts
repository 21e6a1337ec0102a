export function readByte(data: Uint8Array, offset: number): number {
  if (offset < 0 || offset >= data.length) {
    return 0;
  }
  return data[offset] ?? 0;
}

export function readUint16LE(data: Uint8Array, offset: number): number {
  if (offset < 0 || offset + 2 > data.length) {
    return 0;
  }
  return readByte(data, offset) | (readByte(data, offset + 1) << 8);
}

export function readInt16LE(data: Uint8Array, offset: number): number {
  const raw = readUint16LE(data, offset);
  return raw & 0x8000 ? raw - 0x10000 : raw;
}

export function readUint32LE(data: Uint8Array, offset: number): number {
  if (offset < 0 || offset + 4 > data.length) {
    return 0;
  }
  // >>> 0 keeps the top byte from turning the result negative
  return (
    (readByte(data, offset) |
      (readByte(data, offset + 1) << 8) |
      (readByte(data, offset + 2) << 16) |
      (readByte(data, offset + 3) << 24)) >>>
    0
  );
}

export function xorChecksum(data: Uint8Array): number {
  let check = 0;
  for (const byte of data) {
    check ^= byte;
  }
  return check;
}

/**
 * Printable ASCII view of a payload, used to match model markers in
 * firmware strings. Non-printable bytes are dropped.
 */
export function toPrintableAscii(data: Uint8Array): string {
  let out = '';
  for (const byte of data) {
    if (byte >= 0x20 && byte <= 0x7e) {
      out += String.fromCharCode(byte);
    }
  }
  return out;
}

export function toHex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join(' ');
}
