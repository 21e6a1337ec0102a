import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  readByte,
  readInt16LE,
  readUint16LE,
  readUint32LE,
  toHex,
  toPrintableAscii,
  xorChecksum,
} from './buffer-utils';

describe('readByte', () => {
  it('reads byte at valid offset', () => {
    const data = new Uint8Array([0x12, 0x34, 0x56]);
    expect(readByte(data, 0)).toBe(0x12);
    expect(readByte(data, 1)).toBe(0x34);
    expect(readByte(data, 2)).toBe(0x56);
  });

  it('returns 0 for out of bounds offset', () => {
    const data = new Uint8Array([0x12, 0x34]);
    expect(readByte(data, 2)).toBe(0);
    expect(readByte(data, 100)).toBe(0);
  });

  it('returns 0 for negative offset', () => {
    expect(readByte(new Uint8Array([0x12]), -1)).toBe(0);
  });

  it('handles empty array', () => {
    expect(readByte(new Uint8Array([]), 0)).toBe(0);
  });
});

describe('readUint16LE', () => {
  it('reads little-endian value', () => {
    expect(readUint16LE(new Uint8Array([0x34, 0x12]), 0)).toBe(0x1234);
  });

  it('reads at an offset', () => {
    expect(readUint16LE(new Uint8Array([0x00, 0xff, 0xff]), 1)).toBe(0xffff);
  });

  it('returns 0 when fewer than 2 bytes remain', () => {
    expect(readUint16LE(new Uint8Array([0x12]), 0)).toBe(0);
    expect(readUint16LE(new Uint8Array([0x12, 0x34]), 1)).toBe(0);
  });
});

describe('readInt16LE', () => {
  it('reads positive values', () => {
    expect(readInt16LE(new Uint8Array([0xd2, 0x04]), 0)).toBe(1234);
  });

  it('reads negative values', () => {
    // -1234 = 0xfb2e
    expect(readInt16LE(new Uint8Array([0x2e, 0xfb]), 0)).toBe(-1234);
    expect(readInt16LE(new Uint8Array([0xff, 0xff]), 0)).toBe(-1);
    expect(readInt16LE(new Uint8Array([0x00, 0x80]), 0)).toBe(-32768);
  });

  it('matches DataView for any two bytes', () => {
    fc.assert(
      fc.property(fc.integer({ min: -32768, max: 32767 }), (value) => {
        const view = new DataView(new ArrayBuffer(2));
        view.setInt16(0, value, true);
        return readInt16LE(new Uint8Array(view.buffer), 0) === value;
      }),
    );
  });
});

describe('readUint32LE', () => {
  it('reads little-endian value', () => {
    expect(readUint32LE(new Uint8Array([0x40, 0x42, 0x0f, 0x00]), 0)).toBe(
      1_000_000,
    );
  });

  it('stays unsigned when the top bit is set', () => {
    expect(readUint32LE(new Uint8Array([0xff, 0xff, 0xff, 0xff]), 0)).toBe(
      0xffffffff,
    );
  });

  it('returns 0 when fewer than 4 bytes remain', () => {
    expect(readUint32LE(new Uint8Array([0x01, 0x02, 0x03]), 0)).toBe(0);
  });
});

describe('xorChecksum', () => {
  it('returns 0 for empty input', () => {
    expect(xorChecksum(new Uint8Array([]))).toBe(0);
  });

  it('XORs every byte', () => {
    // 0x43 ^ 0x52 = 0x11; 0x11 ^ 0x58 = 0x49
    expect(xorChecksum(new Uint8Array([0x43, 0x52, 0x58]))).toBe(0x49);
  });

  it('appending the checksum yields zero', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 64 }), (bytes) => {
        const framed = Uint8Array.from([...bytes, xorChecksum(bytes)]);
        return xorChecksum(framed) === 0;
      }),
    );
  });
});

describe('toPrintableAscii', () => {
  it('keeps printable characters and drops the rest', () => {
    const data = new Uint8Array([0x00, 0x47, 0x54, 0x0a, 0x2d, 0x53, 0xff]);
    expect(toPrintableAscii(data)).toBe('GT-S');
  });

  it('returns an empty string for binary firmware revisions', () => {
    expect(toPrintableAscii(new Uint8Array([0x10, 0x13]))).toBe('');
  });
});

describe('toHex', () => {
  it('formats bytes as space-separated pairs', () => {
    expect(toHex(new Uint8Array([0x00, 0x0f, 0xab]))).toBe('00 0f ab');
  });
});
