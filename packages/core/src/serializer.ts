/**
 * Return value codecs
 */

import { decode, encode } from '@msgpack/msgpack';

export interface Serializer {
  /** Codec name, recorded for debugging */
  readonly name: string;
  encode(value: unknown): Uint8Array;
  decode(bytes: Uint8Array): unknown;
}

export const msgpackSerializer: Serializer = {
  name: 'msgpack',
  encode: (value) => encode(value),
  decode: (bytes) => decode(bytes),
};

/**
 * UTF-8 JSON codec, for entries meant to be read by other tools
 */
export const jsonSerializer: Serializer = {
  name: 'json',
  encode: (value) => new TextEncoder().encode(JSON.stringify(value)),
  decode: (bytes) => JSON.parse(new TextDecoder().decode(bytes)) as unknown,
};
