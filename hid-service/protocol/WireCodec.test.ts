import { ARUID, DEVICE_HANDLE, U32 } from './Layouts';
import {
  ByteReader,
  ByteWriter,
  EMPTY_LAYOUT,
  bytesLayout,
  decodeBuffer,
  decodeStruct,
  defineLayout,
  encodeBuffer,
  encodeStruct,
} from './WireCodec';

describe('WireCodec', () => {
  describe('ByteReader', () => {
    test('should read little-endian fields in order', () => {
      const reader = new ByteReader(
        new Uint8Array([0x01, 0x02, 0x03, 0x04, 0xff, 0xff, 0xff, 0xff, 0x08, 0x07, 0x06, 0x05, 0x04, 0x03, 0x02, 0x01]),
      );

      expect(reader.u32()).toBe(0x04030201);
      expect(reader.s32()).toBe(-1);
      expect(reader.u64()).toBe(0x0102030405060708n);
      expect(reader.remaining).toBe(0);
    });

    test('should treat any non-zero byte as true', () => {
      const reader = new ByteReader(new Uint8Array([0, 1, 0x80]));

      expect(reader.bool()).toBe(false);
      expect(reader.bool()).toBe(true);
      expect(reader.bool()).toBe(true);
    });

    test('should honour the byte offset of a subarray', () => {
      const backing = new Uint8Array([0xaa, 0xbb, 0x10, 0x00, 0x00, 0x00]);
      const reader = new ByteReader(backing.subarray(2));

      expect(reader.u32()).toBe(0x10);
    });

    test('should refuse to read or skip past the end', () => {
      const reader = new ByteReader(new Uint8Array(3));

      expect(() => reader.bytes(4)).toThrow(RangeError);
      expect(() => reader.skip(4)).toThrow(RangeError);
      expect(() => reader.u32()).toThrow(RangeError);
    });
  });

  describe('ByteWriter', () => {
    test('should write little-endian fields and leave padding zeroed', () => {
      const writer = new ByteWriter(8);
      writer.u16(0x0201);
      writer.pad(2);
      writer.s32(-2);

      expect(Array.from(writer.finish())).toEqual([0x01, 0x02, 0, 0, 0xfe, 0xff, 0xff, 0xff]);
    });

    test('should refuse to finish a partially written block', () => {
      const writer = new ByteWriter(4);
      writer.u8(1);

      expect(() => writer.finish()).toThrow('Block written to 1 of 4 bytes');
    });

    test('should refuse writes past the end', () => {
      const writer = new ByteWriter(2);

      expect(() => writer.bytes(new Uint8Array(3))).toThrow(RangeError);
      expect(() => writer.pad(3)).toThrow(RangeError);
    });
  });

  describe('decodeStruct', () => {
    test('should decode a block of exactly the layout size', () => {
      const decoded = decodeStruct(ARUID, new Uint8Array([0x2a, 0, 0, 0, 0, 0, 0, 0]));

      expect(decoded).toEqual({ ok: true, value: 42n });
    });

    test.each([0, 7, 9, 16])('should report a parameter-size violation for %i bytes', (length) => {
      const decoded = decodeStruct(ARUID, new Uint8Array(length));

      expect(decoded.ok).toBe(false);
      if (!decoded.ok) {
        expect(decoded.violation).toMatchObject({
          command: 'AppletResourceUserId',
          reason: 'parameter-size',
          expected: 8,
          actual: length,
        });
      }
    });

    test('should accept an empty block for the empty layout', () => {
      expect(decodeStruct(EMPTY_LAYOUT, new Uint8Array(0))).toEqual({ ok: true, value: undefined });
    });

    test('should throw for a layout that does not consume its declared size', () => {
      const broken = defineLayout<number>({
        name: 'Broken',
        size: 8,
        read: (reader) => reader.u32(),
        write: (writer, value) => writer.u32(value),
      });

      expect(() => decodeStruct(broken, new Uint8Array(8))).toThrow('Layout Broken consumed 4 of 8 bytes');
    });
  });

  describe('encodeStruct', () => {
    test('should throw for a layout that under-fills its block', () => {
      const broken = defineLayout<number>({
        name: 'Broken',
        size: 8,
        read: (reader) => reader.u32(),
        write: (writer, value) => writer.u32(value),
      });

      expect(() => encodeStruct(broken, 1)).toThrow('Block written to 4 of 8 bytes');
    });
  });

  describe('buffers', () => {
    test('should encode and decode a run of elements', () => {
      const bytes = encodeBuffer(U32, [0, 1, 2, 3]);

      expect(Array.from(bytes)).toEqual([0, 0, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0]);
      expect(decodeBuffer(U32, bytes)).toEqual({ ok: true, value: [0, 1, 2, 3] });
    });

    test('should decode an empty buffer as no elements', () => {
      expect(decodeBuffer(DEVICE_HANDLE, new Uint8Array(0))).toEqual({ ok: true, value: [] });
    });

    test('should report a buffer-stride violation when the length is not a multiple of the stride', () => {
      const decoded = decodeBuffer(DEVICE_HANDLE, new Uint8Array(6));

      expect(decoded.ok).toBe(false);
      if (!decoded.ok) {
        expect(decoded.violation).toMatchObject({
          command: 'DeviceHandle',
          reason: 'buffer-stride',
          expected: 4,
          actual: 6,
        });
      }
    });

    test('should refuse a zero-size element layout', () => {
      expect(() => decodeBuffer(EMPTY_LAYOUT, new Uint8Array(0))).toThrow(
        'Layout Empty cannot be used as a buffer element',
      );
    });
  });

  describe('bytesLayout', () => {
    test('should copy an opaque block of the declared length', () => {
      const layout = bytesLayout('Blob', 3);
      const source = new Uint8Array([9, 8, 7]);

      const encoded = encodeStruct(layout, source);
      source[0] = 0;

      expect(Array.from(encoded)).toEqual([9, 8, 7]);
    });

    test('should refuse a value of the wrong length', () => {
      const layout = bytesLayout('Blob', 3);

      expect(() => encodeStruct(layout, new Uint8Array(2))).toThrow('Blob expects 3 bytes, got 2');
    });
  });

  test('should reject a layout with a negative size', () => {
    expect(() =>
      defineLayout<undefined>({ name: 'Negative', size: -1, read: () => undefined, write: () => undefined }),
    ).toThrow('Layout Negative has invalid size -1');
  });
});
