import { ProtocolViolation, VIOLATION_REASONS, createViolation } from './ProtocolViolation';

// All multi-byte fields on the wire are little-endian
const LITTLE_ENDIAN = true;

export class ByteReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly source: Uint8Array) {
    this.view = new DataView(source.buffer, source.byteOffset, source.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.source.byteLength - this.offset;
  }

  u8(): number {
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  bool(): boolean {
    return this.u8() !== 0;
  }

  u16(): number {
    const value = this.view.getUint16(this.offset, LITTLE_ENDIAN);
    this.offset += 2;
    return value;
  }

  u32(): number {
    const value = this.view.getUint32(this.offset, LITTLE_ENDIAN);
    this.offset += 4;
    return value;
  }

  s32(): number {
    const value = this.view.getInt32(this.offset, LITTLE_ENDIAN);
    this.offset += 4;
    return value;
  }

  f32(): number {
    const value = this.view.getFloat32(this.offset, LITTLE_ENDIAN);
    this.offset += 4;
    return value;
  }

  u64(): bigint {
    const value = this.view.getBigUint64(this.offset, LITTLE_ENDIAN);
    this.offset += 8;
    return value;
  }

  s64(): bigint {
    const value = this.view.getBigInt64(this.offset, LITTLE_ENDIAN);
    this.offset += 8;
    return value;
  }

  bytes(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new RangeError(`Read of ${length} bytes overruns block (${this.remaining} left)`);
    }
    const slice = this.source.slice(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  skip(count: number): void {
    if (count > this.remaining) {
      throw new RangeError(`Skip of ${count} bytes overruns block (${this.remaining} left)`);
    }
    this.offset += count;
  }
}

export class ByteWriter {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(size: number) {
    this.buffer = new Uint8Array(size);
    this.view = new DataView(this.buffer.buffer);
  }

  get position(): number {
    return this.offset;
  }

  u8(value: number): void {
    this.view.setUint8(this.offset, value);
    this.offset += 1;
  }

  bool(value: boolean): void {
    this.u8(value ? 1 : 0);
  }

  u16(value: number): void {
    this.view.setUint16(this.offset, value, LITTLE_ENDIAN);
    this.offset += 2;
  }

  u32(value: number): void {
    this.view.setUint32(this.offset, value, LITTLE_ENDIAN);
    this.offset += 4;
  }

  s32(value: number): void {
    this.view.setInt32(this.offset, value, LITTLE_ENDIAN);
    this.offset += 4;
  }

  f32(value: number): void {
    this.view.setFloat32(this.offset, value, LITTLE_ENDIAN);
    this.offset += 4;
  }

  u64(value: bigint): void {
    this.view.setBigUint64(this.offset, value, LITTLE_ENDIAN);
    this.offset += 8;
  }

  s64(value: bigint): void {
    this.view.setBigInt64(this.offset, value, LITTLE_ENDIAN);
    this.offset += 8;
  }

  bytes(value: Uint8Array): void {
    if (value.byteLength > this.buffer.byteLength - this.offset) {
      throw new RangeError(`Write of ${value.byteLength} bytes overruns block`);
    }
    this.buffer.set(value, this.offset);
    this.offset += value.byteLength;
  }

  // Padding is left zeroed
  pad(count: number): void {
    if (count > this.buffer.byteLength - this.offset) {
      throw new RangeError(`Padding of ${count} bytes overruns block`);
    }
    this.offset += count;
  }

  finish(): Uint8Array {
    if (this.offset !== this.buffer.byteLength) {
      throw new Error(`Block written to ${this.offset} of ${this.buffer.byteLength} bytes`);
    }
    return this.buffer;
  }
}

/**
 * Explicit field-by-field description of one fixed-size wire struct.
 * `read` and `write` must each consume exactly `size` bytes.
 */
export interface StructLayout<T> {
  readonly name: string;
  readonly size: number;
  read(reader: ByteReader): T;
  write(writer: ByteWriter, value: T): void;
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; violation: ProtocolViolation };

export function defineLayout<T>(layout: StructLayout<T>): StructLayout<T> {
  if (!Number.isInteger(layout.size) || layout.size < 0) {
    throw new Error(`Layout ${layout.name} has invalid size ${layout.size}`);
  }
  return Object.freeze(layout);
}

export const EMPTY_LAYOUT: StructLayout<undefined> = defineLayout({
  name: 'Empty',
  size: 0,
  read: () => undefined,
  write: () => undefined,
});

// Opaque byte block of a fixed length
export function bytesLayout(name: string, size: number): StructLayout<Uint8Array> {
  return defineLayout({
    name,
    size,
    read: (reader) => reader.bytes(size),
    write: (writer, value) => {
      if (value.byteLength !== size) {
        throw new Error(`${name} expects ${size} bytes, got ${value.byteLength}`);
      }
      writer.bytes(value);
    },
  });
}

// Decodes a fixed parameter block; the length must match the layout exactly
export function decodeStruct<T>(layout: StructLayout<T>, bytes: Uint8Array): DecodeResult<T> {
  if (bytes.byteLength !== layout.size) {
    return {
      ok: false,
      violation: createViolation(layout.name, VIOLATION_REASONS.PARAMETER_SIZE, layout.size, bytes.byteLength),
    };
  }

  const reader = new ByteReader(bytes);
  const value = layout.read(reader);

  if (reader.position !== layout.size) {
    throw new Error(`Layout ${layout.name} consumed ${reader.position} of ${layout.size} bytes`);
  }

  return { ok: true, value };
}

// Infallible for well-formed values; a throw here is a layout bug
export function encodeStruct<T>(layout: StructLayout<T>, value: T): Uint8Array {
  const writer = new ByteWriter(layout.size);
  layout.write(writer, value);
  return writer.finish();
}

// Decodes a buffer as a run of fixed-stride elements
export function decodeBuffer<T>(layout: StructLayout<T>, bytes: Uint8Array): DecodeResult<T[]> {
  if (layout.size === 0) {
    throw new Error(`Layout ${layout.name} cannot be used as a buffer element`);
  }

  if (bytes.byteLength % layout.size !== 0) {
    return {
      ok: false,
      violation: createViolation(
        layout.name,
        VIOLATION_REASONS.BUFFER_STRIDE,
        layout.size,
        bytes.byteLength,
        `buffer of ${bytes.byteLength} bytes is not a multiple of the ${layout.size}-byte stride`,
      ),
    };
  }

  const count = bytes.byteLength / layout.size;
  const values: T[] = [];
  for (let i = 0; i < count; i++) {
    const element = bytes.subarray(i * layout.size, (i + 1) * layout.size);
    const reader = new ByteReader(element);
    values.push(layout.read(reader));
  }

  return { ok: true, value: values };
}

export function encodeBuffer<T>(layout: StructLayout<T>, values: readonly T[]): Uint8Array {
  const out = new Uint8Array(layout.size * values.length);
  values.forEach((value, index) => {
    out.set(encodeStruct(layout, value), index * layout.size);
  });
  return out;
}
