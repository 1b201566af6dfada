// src/types/primitives.ts
import { ErrorMessages } from '../wire/index.ts';
import type { Decoder, Encoder, Position, WireType } from '../wire/index.ts';

interface NumberLayout {
  size: number;
  min: number;
  max: number;
  read(position: Position): number;
  write(position: Position, value: number): void;
}

function integer(layout: NumberLayout): WireType<number> {
  return {
    inlineSize: layout.size,
    inlineAlign: layout.size,
    encode(encoder: Encoder, value: number, position: Position): void {
      if (!Number.isInteger(value) || value < layout.min || value > layout.max) {
        encoder.setError('VALIDATION', `${ErrorMessages.INTEGER_OUT_OF_RANGE}: ${value}`);
        return;
      }
      layout.write(position, value);
    },
    decode(_decoder: Decoder, position: Position): number {
      return layout.read(position);
    },
  };
}

function bigInteger(
  min: bigint,
  max: bigint,
  read: (position: Position) => bigint,
  write: (position: Position, value: bigint) => void,
): WireType<bigint> {
  return {
    inlineSize: 8,
    inlineAlign: 8,
    encode(encoder: Encoder, value: bigint, position: Position): void {
      if (value < min || value > max) {
        encoder.setError('VALIDATION', `${ErrorMessages.INTEGER_OUT_OF_RANGE}: ${value}`);
        return;
      }
      write(position, value);
    },
    decode(_decoder: Decoder, position: Position): bigint {
      return read(position);
    },
  };
}

export const bool: WireType<boolean> = {
  inlineSize: 1,
  inlineAlign: 1,
  encode(_encoder: Encoder, value: boolean, position: Position): void {
    position.writeUint8(0, value ? 1 : 0);
  },
  decode(decoder: Decoder, position: Position): boolean | undefined {
    const byte = position.readUint8(0);
    if (byte > 1) {
      decoder.setError('VALIDATION', ErrorMessages.INVALID_BOOL);
      return undefined;
    }
    return byte === 1;
  },
};

export const uint8 = integer({
  size: 1, min: 0, max: 0xff,
  read: (p) => p.readUint8(0),
  write: (p, v) => p.writeUint8(0, v),
});

export const uint16 = integer({
  size: 2, min: 0, max: 0xffff,
  read: (p) => p.readUint16(0),
  write: (p, v) => p.writeUint16(0, v),
});

export const uint32 = integer({
  size: 4, min: 0, max: 0xffff_ffff,
  read: (p) => p.readUint32(0),
  write: (p, v) => p.writeUint32(0, v),
});

export const int8 = integer({
  size: 1, min: -0x80, max: 0x7f,
  read: (p) => p.readInt8(0),
  write: (p, v) => p.writeInt8(0, v),
});

export const int16 = integer({
  size: 2, min: -0x8000, max: 0x7fff,
  read: (p) => p.readInt16(0),
  write: (p, v) => p.writeInt16(0, v),
});

export const int32 = integer({
  size: 4, min: -0x8000_0000, max: 0x7fff_ffff,
  read: (p) => p.readInt32(0),
  write: (p, v) => p.writeInt32(0, v),
});

export const uint64 = bigInteger(
  0n,
  0xffff_ffff_ffff_ffffn,
  (p) => p.readUint64(0),
  (p, v) => p.writeUint64(0, v),
);

export const int64 = bigInteger(
  -0x8000_0000_0000_0000n,
  0x7fff_ffff_ffff_ffffn,
  (p) => p.readInt64(0),
  (p, v) => p.writeInt64(0, v),
);

export const float32: WireType<number> = {
  inlineSize: 4,
  inlineAlign: 4,
  encode(_encoder: Encoder, value: number, position: Position): void {
    position.writeFloat32(0, value);
  },
  decode(_decoder: Decoder, position: Position): number {
    return position.readFloat32(0);
  },
};

export const float64: WireType<number> = {
  inlineSize: 8,
  inlineAlign: 8,
  encode(_encoder: Encoder, value: number, position: Position): void {
    position.writeFloat64(0, value);
  },
  decode(_decoder: Decoder, position: Position): number {
    return position.readFloat64(0);
  },
};
