// osc-min ships no type declarations; this covers the part of its API the codec uses.
declare module 'osc-min' {
  namespace oscMin {
    interface Argument {
      type: string;
      value?: unknown;
    }

    interface Message {
      oscType?: 'message';
      address: string;
      args?: Argument[];
    }

    interface Bundle {
      oscType: 'bundle';
      timetag: [number, number] | number | Date;
      elements: Packet[];
    }

    type Packet = Message | Bundle;

    interface DecodedMessage {
      oscType: 'message';
      address: string;
      args: Argument[];
    }

    interface DecodedBundle {
      oscType: 'bundle';
      timetag: unknown;
      elements: Decoded[];
    }

    type Decoded = DecodedMessage | DecodedBundle;

    function toBuffer(packet: Packet, strict?: boolean): Buffer;
    function fromBuffer(buffer: Buffer, strict?: boolean): Decoded;
  }

  export = oscMin;
}
