/**
 * OSC 1.0 codec on top of osc-min.
 *
 * osc-min does the argument encoding and the strict message parse. This
 * module adds the framing rules the node relies on: packets are whole
 * 4-byte words, addresses start with '/', bundle element sizes fit the
 * packet, and a decoded message must re-encode to exactly the bytes it
 * came from (a short blob or stray trailing bytes fail that check).
 */

import oscMin from 'osc-min';
import { DecodeError, describeError } from '../utils/errors.js';
import type { OscArgument, OscBundle, OscMessage, OscValue } from './types.js';

export const BUNDLE_MARKER = '#bundle';

/** Time tag value meaning "process immediately". */
export const IMMEDIATELY = 1n;

/** Largest datagram the node sends or accepts. */
export const MAX_PACKET_SIZE = 60000;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

const BUNDLE_HEADER_SIZE = 16;
const SLASH = 0x2f;

const LIBRARY_TYPES = {
  i: 'integer',
  f: 'float',
  s: 'string',
  b: 'blob',
} as const satisfies Record<OscArgument['type'], string>;

function padded(length: number): number {
  return Math.ceil(length / 4) * 4;
}

export function int(value: number): OscArgument {
  return { type: 'i', value };
}

export function float(value: number): OscArgument {
  return { type: 'f', value };
}

export function str(value: string): OscArgument {
  return { type: 's', value };
}

export function blob(value: Buffer): OscArgument {
  return { type: 'b', value };
}

/**
 * Pick a type tag for a plain value: integers in int32 range become `i`,
 * other numbers `f`.
 */
export function inferArgument(value: OscValue): OscArgument {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
      ? int(value)
      : float(value);
  }
  if (typeof value === 'string') return str(value);
  return blob(value);
}

/**
 * Build an immutable message. Plain values go through `inferArgument`;
 * pre-built arguments are kept as they are.
 */
export function oscMessage(address: string, ...values: (OscValue | OscArgument)[]): OscMessage {
  const args = values.map((value) =>
    typeof value === 'object' && !Buffer.isBuffer(value) ? value : inferArgument(value)
  );
  return freezeMessage(address, args);
}

function freezeMessage(address: string, args: OscArgument[]): OscMessage {
  // Buffers cannot be frozen; the argument wrappers and the list can.
  return Object.freeze({
    address,
    args: Object.freeze(args.map((arg) => Object.freeze(arg))),
  });
}

/**
 * Argument values in a log-friendly form.
 */
export function argumentValues(message: OscMessage): (number | string)[] {
  return message.args.map((arg) =>
    arg.type === 'b' ? `<blob ${arg.value.length} bytes>` : arg.value
  );
}

// Encoding

function toLibraryMessage(message: OscMessage): oscMin.Message {
  return {
    address: message.address,
    args: message.args.map((arg) => ({ type: LIBRARY_TYPES[arg.type], value: arg.value })),
  };
}

function toTimetag(timeTag: bigint): [number, number] {
  return [Number(timeTag >> 32n), Number(timeTag & 0xffffffffn)];
}

function isBundle(element: OscMessage | OscBundle): element is OscBundle {
  return 'elements' in element;
}

function toLibraryPacket(element: OscMessage | OscBundle): oscMin.Packet {
  if (!isBundle(element)) return toLibraryMessage(element);
  return {
    oscType: 'bundle',
    timetag: toTimetag(element.timeTag),
    elements: element.elements.map(toLibraryPacket),
  };
}

export function encodeMessage(message: OscMessage): Buffer {
  return oscMin.toBuffer(toLibraryMessage(message));
}

export function encodeBundle(
  elements: readonly (OscMessage | OscBundle)[],
  timeTag: bigint = IMMEDIATELY
): Buffer {
  return oscMin.toBuffer(toLibraryPacket({ timeTag, elements }));
}

// Decoding

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function checkFraming(buffer: Buffer): void {
  if (buffer.length < 4) {
    throw new DecodeError('truncated', `packet is ${buffer.length} bytes`);
  }
  if (buffer.length % 4 !== 0) {
    throw new DecodeError('misaligned', `packet length ${buffer.length} is not a multiple of 4`);
  }
}

function isBundlePacket(buffer: Buffer): boolean {
  return buffer.length >= 8 && buffer.toString('latin1', 0, 8) === `${BUNDLE_MARKER}\0`;
}

/** Older senders omit the type tag string entirely when there are no arguments. */
function bareAddress(buffer: Buffer): string | null {
  const terminator = buffer.indexOf(0);
  if (terminator === -1 || padded(terminator + 1) !== buffer.length) return null;
  for (let i = terminator; i < buffer.length; i++) {
    if (buffer[i] !== 0) return null;
  }
  return buffer.toString('utf8', 0, terminator);
}

function fromLibraryArgument(arg: oscMin.Argument): OscArgument {
  const { type, value } = arg;
  if (type === 'integer' && typeof value === 'number') return int(value);
  if (type === 'float' && typeof value === 'number') return float(value);
  if (type === 'string' && typeof value === 'string') return str(value);
  if (type === 'blob' && Buffer.isBuffer(value)) return blob(Buffer.from(value));
  throw new DecodeError('unknown-type-tag', `unsupported argument type '${type}'`);
}

function readMessage(buffer: Buffer): OscMessage {
  if (buffer[0] !== SLASH) {
    const shown = buffer.toString('latin1', 0, Math.min(buffer.length, 16)).replace(/\0.*$/s, '');
    throw new DecodeError('invalid-address', `address '${shown}' does not start with '/'`);
  }

  const bare = bareAddress(buffer);
  if (bare !== null) return freezeMessage(bare, []);

  let decoded: oscMin.Decoded;
  try {
    decoded = oscMin.fromBuffer(buffer, true);
  } catch (error) {
    throw new DecodeError('malformed', describeError(error));
  }
  if (decoded.oscType !== 'message') {
    throw new DecodeError('malformed', 'expected a message');
  }

  const message = freezeMessage(decoded.address, decoded.args.map(fromLibraryArgument));
  const reencoded = encodeMessage(message);
  if (!reencoded.equals(buffer)) {
    throw new DecodeError(
      'non-canonical',
      `packet is ${buffer.length} bytes but its arguments account for ${reencoded.length}`
    );
  }
  return message;
}

/** Walk a bundle's size-prefixed elements, appending the messages in order. */
function readBundle(buffer: Buffer, into: OscMessage[]): void {
  if (buffer.length < BUNDLE_HEADER_SIZE) {
    throw new DecodeError('truncated', `bundle header needs ${BUNDLE_HEADER_SIZE} bytes, got ${buffer.length}`);
  }

  let offset = BUNDLE_HEADER_SIZE;
  while (offset < buffer.length) {
    if (buffer.length - offset < 4) {
      throw new DecodeError('truncated', `bundle element size missing at byte ${offset}`);
    }
    const size = buffer.readInt32BE(offset);
    offset += 4;
    if (size <= 0 || size % 4 !== 0) {
      throw new DecodeError('misaligned', `bundle element size ${size}`);
    }
    if (size > buffer.length - offset) {
      throw new DecodeError(
        'truncated',
        `bundle element of ${size} bytes at byte ${offset}, ${buffer.length - offset} left`
      );
    }
    const element = buffer.subarray(offset, offset + size);
    offset += size;
    if (isBundlePacket(element)) {
      readBundle(element, into);
    } else {
      into.push(readMessage(element));
    }
  }
}

/**
 * Decode a single OSC message.
 *
 * @throws {DecodeError} on truncated input, bad padding or unsupported type tags.
 */
export function decodeMessage(bytes: Uint8Array): OscMessage {
  const buffer = toBuffer(bytes);
  checkFraming(buffer);
  return readMessage(buffer);
}

/**
 * Decode a datagram holding either a message or a bundle and return its
 * messages in packet order. Time tags are not honoured.
 */
export function decodePacket(bytes: Uint8Array): OscMessage[] {
  const buffer = toBuffer(bytes);
  checkFraming(buffer);
  if (!isBundlePacket(buffer)) {
    return [readMessage(buffer)];
  }
  const messages: OscMessage[] = [];
  readBundle(buffer, messages);
  return messages;
}
