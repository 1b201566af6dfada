// src/wire/position.ts

/**
 * A bounds-checked window into the buffer a coder is reading or writing.
 *
 * `offset` indexes the underlying buffer; `messageOffset` is where the window
 * starts in the logical message, which differs from `offset` on the encode
 * side once zero-copy extents have been gathered.
 */
export class Position {
  private readonly view: DataView;

  constructor(
    readonly buffer: Uint8Array,
    readonly offset: number,
    readonly size: number,
    readonly messageOffset: number = offset,
  ) {
    if (offset < 0 || size < 0 || offset + size > buffer.length) {
      throw new RangeError(`position [${offset}, ${offset + size}) outside buffer of ${buffer.length}`);
    }
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  sub(at: number, size: number): Position {
    this.check(at, size);
    return new Position(this.buffer, this.offset + at, size, this.messageOffset + at);
  }

  readUint8(at: number): number {
    this.check(at, 1);
    return this.view.getUint8(this.offset + at);
  }

  readUint16(at: number): number {
    this.check(at, 2);
    return this.view.getUint16(this.offset + at, true);
  }

  readUint32(at: number): number {
    this.check(at, 4);
    return this.view.getUint32(this.offset + at, true);
  }

  readUint64(at: number): bigint {
    this.check(at, 8);
    return this.view.getBigUint64(this.offset + at, true);
  }

  readInt8(at: number): number {
    this.check(at, 1);
    return this.view.getInt8(this.offset + at);
  }

  readInt16(at: number): number {
    this.check(at, 2);
    return this.view.getInt16(this.offset + at, true);
  }

  readInt32(at: number): number {
    this.check(at, 4);
    return this.view.getInt32(this.offset + at, true);
  }

  readInt64(at: number): bigint {
    this.check(at, 8);
    return this.view.getBigInt64(this.offset + at, true);
  }

  readFloat32(at: number): number {
    this.check(at, 4);
    return this.view.getFloat32(this.offset + at, true);
  }

  readFloat64(at: number): number {
    this.check(at, 8);
    return this.view.getFloat64(this.offset + at, true);
  }

  /** Copies `length` bytes out of the window. */
  readBytes(at: number, length: number): Uint8Array {
    this.check(at, length);
    return this.buffer.slice(this.offset + at, this.offset + at + length);
  }

  /** A view (no copy) over `length` bytes of the window. */
  viewBytes(at: number, length: number): Uint8Array {
    this.check(at, length);
    return this.buffer.subarray(this.offset + at, this.offset + at + length);
  }

  isZero(at: number, length: number): boolean {
    this.check(at, length);
    for (let i = this.offset + at; i < this.offset + at + length; i++) {
      if (this.buffer[i] !== 0) return false;
    }
    return true;
  }

  writeUint8(at: number, value: number): void {
    this.check(at, 1);
    this.view.setUint8(this.offset + at, value);
  }

  writeUint16(at: number, value: number): void {
    this.check(at, 2);
    this.view.setUint16(this.offset + at, value, true);
  }

  writeUint32(at: number, value: number): void {
    this.check(at, 4);
    this.view.setUint32(this.offset + at, value, true);
  }

  writeUint64(at: number, value: bigint): void {
    this.check(at, 8);
    this.view.setBigUint64(this.offset + at, value, true);
  }

  writeInt8(at: number, value: number): void {
    this.check(at, 1);
    this.view.setInt8(this.offset + at, value);
  }

  writeInt16(at: number, value: number): void {
    this.check(at, 2);
    this.view.setInt16(this.offset + at, value, true);
  }

  writeInt32(at: number, value: number): void {
    this.check(at, 4);
    this.view.setInt32(this.offset + at, value, true);
  }

  writeInt64(at: number, value: bigint): void {
    this.check(at, 8);
    this.view.setBigInt64(this.offset + at, value, true);
  }

  writeFloat32(at: number, value: number): void {
    this.check(at, 4);
    this.view.setFloat32(this.offset + at, value, true);
  }

  writeFloat64(at: number, value: number): void {
    this.check(at, 8);
    this.view.setFloat64(this.offset + at, value, true);
  }

  writeBytes(at: number, bytes: Uint8Array): void {
    this.check(at, bytes.length);
    this.buffer.set(bytes, this.offset + at);
  }

  fill(at: number, length: number, byte = 0): void {
    this.check(at, length);
    this.buffer.fill(byte, this.offset + at, this.offset + at + length);
  }

  private check(at: number, length: number): void {
    if (!Number.isInteger(at) || at < 0 || length < 0 || at + length > this.size) {
      throw new RangeError(`access [${at}, ${at + length}) outside position of size ${this.size}`);
    }
  }
}
