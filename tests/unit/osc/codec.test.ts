import { describe, it, expect } from 'vitest';
import {
  argumentValues,
  blob,
  decodeMessage,
  decodePacket,
  encodeBundle,
  encodeMessage,
  float,
  inferArgument,
  int,
  oscMessage,
  str,
} from '../../../src/osc/codec.js';
import { DecodeError } from '../../../src/utils/errors.js';

function decodeFailure(bytes: Buffer): DecodeError {
  try {
    decodePacket(bytes);
  } catch (error) {
    if (error instanceof DecodeError) return error;
    throw error;
  }
  throw new Error('expected the packet to be rejected');
}

describe('OSC codec', () => {
  describe('oscMessage()', () => {
    it('should infer type tags from plain values', () => {
      const message = oscMessage('/mix', 3, 3.5, 'text', Buffer.from([1, 2]));
      expect(message.args.map((arg) => arg.type)).toEqual(['i', 'f', 's', 'b']);
    });

    it('should keep explicit arguments', () => {
      const message = oscMessage('/explicit', float(2), int(7));
      expect(message.args).toEqual([
        { type: 'f', value: 2 },
        { type: 'i', value: 7 },
      ]);
    });

    it('should produce frozen messages', () => {
      const message = oscMessage('/frozen', 1);
      expect(Object.isFrozen(message)).toBe(true);
      expect(Object.isFrozen(message.args)).toBe(true);
    });
  });

  describe('inferArgument()', () => {
    it('should treat numbers outside int32 as floats', () => {
      expect(inferArgument(2 ** 40)).toEqual({ type: 'f', value: 2 ** 40 });
      expect(inferArgument(-5)).toEqual({ type: 'i', value: -5 });
    });
  });

  describe('encodeMessage()', () => {
    it('should pad the address and an empty type tag string', () => {
      const bytes = encodeMessage(oscMessage('/ping'));
      expect(bytes.toString('hex')).toBe('2f70696e67000000' + '2c000000');
    });

    it('should encode int32 arguments big-endian', () => {
      const bytes = encodeMessage(oscMessage('/pong', 1));
      expect(bytes.length).toBe(16);
      expect(bytes.toString('hex')).toBe('2f706f6e67000000' + '2c690000' + '00000001');
    });

    it('should encode float32 arguments big-endian', () => {
      const bytes = encodeMessage(oscMessage('/f', float(1)));
      expect(bytes.toString('hex')).toBe('2f660000' + '2c660000' + '3f800000');
    });

    it('should prefix blobs with their length and pad them', () => {
      const bytes = encodeMessage(oscMessage('/b', blob(Buffer.from([0xaa, 0xbb, 0xcc]))));
      expect(bytes.toString('hex')).toBe('2f620000' + '2c620000' + '00000003' + 'aabbcc00');
    });

    it('should always produce a multiple of four bytes', () => {
      for (const address of ['/a', '/ab', '/abc', '/abcd']) {
        expect(encodeMessage(oscMessage(address, 'xyz')).length % 4).toBe(0);
      }
    });
  });

  describe('decodeMessage()', () => {
    it('should roundtrip mixed int, float and string arguments', () => {
      const original = oscMessage('/mix', 1, 0.5, 'hello', -42, 2.25, str(''));
      expect(decodeMessage(encodeMessage(original))).toEqual(original);
    });

    it('should roundtrip blobs', () => {
      const original = oscMessage('/blob', Buffer.from('abcde'), 9);
      const decoded = decodeMessage(encodeMessage(original));
      expect(decoded.args[0]).toEqual({ type: 'b', value: Buffer.from('abcde') });
      expect(decoded.args[1]).toEqual({ type: 'i', value: 9 });
    });

    it('should return floats at float32 precision', () => {
      const decoded = decodeMessage(encodeMessage(oscMessage('/f', 0.1)));
      const [arg] = decoded.args;
      expect(arg?.type).toBe('f');
      expect(arg?.value).toBeCloseTo(0.1, 6);
    });

    it('should accept a bare address without a type tag string', () => {
      const decoded = decodeMessage(Buffer.from('/quit\0\0\0', 'latin1'));
      expect(decoded).toEqual({ address: '/quit', args: [] });
    });

    it('should accept a Uint8Array view', () => {
      const bytes = encodeMessage(oscMessage('/view', 5));
      const view = new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
      expect(decodeMessage(view)).toEqual(oscMessage('/view', 5));
    });
  });

  describe('malformed input', () => {
    it('should reject packets shorter than one word as truncated', () => {
      expect(decodeFailure(Buffer.from('/a\0', 'latin1')).reason).toBe('truncated');
    });

    it('should reject a length that is not a multiple of four', () => {
      expect(decodeFailure(Buffer.from('/ping', 'latin1')).reason).toBe('misaligned');
    });

    it('should reject addresses without a leading slash', () => {
      expect(decodeFailure(Buffer.from('ab\0\0,\0\0\0', 'latin1')).reason).toBe('invalid-address');
    });

    it('should reject argument types outside i, f, s and b', () => {
      expect(decodeFailure(Buffer.from('/a\0\0,T\0\0', 'latin1')).reason).toBe('unknown-type-tag');
    });

    it.each([
      ['an unterminated address', Buffer.from('/abc', 'latin1')],
      ['a missing argument', encodeMessage(oscMessage('/pong', 1)).subarray(0, 12)],
      ['an unknown type tag', Buffer.from('/x\0\0,q\0\0', 'latin1')],
      ['non-zero string padding', Buffer.from('/a\0X,\0\0\0', 'latin1')],
      ['a type tag string without a comma', Buffer.from('/a\0\0i\0\0\0', 'latin1')],
      ['bytes after the last argument', Buffer.concat([encodeMessage(oscMessage('/a')), Buffer.alloc(4)])],
      ['a blob that runs past the end', Buffer.concat([Buffer.from('/b\0\0,b\0\0', 'latin1'), Buffer.from('00000010', 'hex')])],
    ])('should reject %s', (_label, bytes) => {
      const error = decodeFailure(bytes);
      expect(error.code).toBe('MALFORMED');
    });

    it.each([0x7ffffffd, 0x7ffffffe, 0x7fffffff])(
      'should reject a blob size of %i as a DecodeError',
      (size) => {
        const declared = Buffer.alloc(4);
        declared.writeInt32BE(size, 0);
        const followed = Buffer.concat([Buffer.from('/a\0\0,bi\0', 'latin1'), declared, Buffer.from('00000001', 'hex')]);
        const last = Buffer.concat([Buffer.from('/a\0\0,b\0\0', 'latin1'), declared, Buffer.from('00000001', 'hex')]);

        expect(() => decodePacket(followed)).toThrow(DecodeError);
        expect(() => decodePacket(last)).toThrow(DecodeError);
      }
    );
  });

  describe('bundles', () => {
    it('should flatten nested bundles in packet order', () => {
      const bytes = encodeBundle([
        oscMessage('/a', 1),
        { timeTag: 1n, elements: [oscMessage('/b', 'x'), oscMessage('/c')] },
        oscMessage('/d', 0.5),
      ]);
      expect(decodePacket(bytes).map((message) => message.address)).toEqual(['/a', '/b', '/c', '/d']);
    });

    it('should write the time tag after the marker and ignore it on decode', () => {
      const bytes = encodeBundle([oscMessage('/a')], 0x0102030405060708n);
      expect(bytes.subarray(0, 16).toString('hex')).toBe('2362756e646c6500' + '0102030405060708');
      expect(decodePacket(bytes)).toEqual([oscMessage('/a')]);
    });

    it('should reject element sizes that are not word aligned', () => {
      const header = encodeBundle([]);
      const bytes = Buffer.concat([header, Buffer.from('00000006', 'hex'), Buffer.alloc(8)]);
      expect(decodeFailure(bytes).reason).toBe('misaligned');
    });

    it('should reject an element size that runs past the end', () => {
      const header = encodeBundle([]);
      const bytes = Buffer.concat([header, Buffer.from('7ffffffc', 'hex'), Buffer.alloc(8)]);
      expect(decodeFailure(bytes).reason).toBe('truncated');
    });

    it('should fail the whole bundle when one element is malformed', () => {
      const header = encodeBundle([oscMessage('/ok')]);
      const bad = Buffer.from('/x\0\0,q\0\0', 'latin1');
      const size = Buffer.alloc(4);
      size.writeInt32BE(bad.length, 0);
      expect(() => decodePacket(Buffer.concat([header, size, bad]))).toThrow(DecodeError);
    });
  });

  describe('argumentValues()', () => {
    it('should summarise blobs for logging', () => {
      expect(argumentValues(oscMessage('/v', 1, 'two', Buffer.alloc(3)))).toEqual([1, 'two', '<blob 3 bytes>']);
    });
  });
});
