// src/types/handle.ts
import { ALLOC_ABSENT_U32, ALLOC_PRESENT_U32, ErrorMessages, Rights } from '../wire/index.ts';
import type {
  Decoder,
  Encoder,
  HandleAttributes,
  ObjectType,
  OwnedHandle,
  Position,
  WireType,
} from '../wire/index.ts';
import { required } from './shared.ts';

export interface HandleOptions {
  objectType?: ObjectType;
  rights?: number;
}

function optionalHandle(attributes: HandleAttributes): WireType<OwnedHandle | null> {
  return {
    inlineSize: 4,
    inlineAlign: 4,
    encode(encoder: Encoder, value: OwnedHandle | null, position: Position): void {
      if (value === null) {
        position.writeUint32(0, ALLOC_ABSENT_U32);
        return;
      }
      if (!encoder.encodeHandle(value, attributes)) return;
      position.writeUint32(0, ALLOC_PRESENT_U32);
    },
    decode(decoder: Decoder, position: Position): OwnedHandle | null | undefined {
      const presence = position.readUint32(0);
      if (presence === ALLOC_ABSENT_U32) return null;
      if (presence !== ALLOC_PRESENT_U32) {
        decoder.setError('VALIDATION', ErrorMessages.INVALID_PRESENCE);
        return undefined;
      }
      return decoder.takeHandle(attributes);
    },
  };
}

/**
 * A handle slot: a u32 presence marker inline, the handle itself in the
 * message's handle array. Decoded handles are checked against `objectType`
 * and `rights`.
 */
export function handle(options?: HandleOptions & { nullable?: false }): WireType<OwnedHandle>;
export function handle(options: HandleOptions & { nullable: true }): WireType<OwnedHandle | null>;
export function handle(
  options: HandleOptions & { nullable?: boolean } = {},
): WireType<OwnedHandle> | WireType<OwnedHandle | null> {
  const inner = optionalHandle({
    objectType: options.objectType ?? 'none',
    rights: options.rights ?? Rights.SAME_RIGHTS,
  });
  return options.nullable ? inner : required(inner);
}
