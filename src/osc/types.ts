/**
 * Typed OSC arguments, discriminated by their type tag character.
 */
export type OscArgument =
  | { readonly type: 'i'; readonly value: number }
  | { readonly type: 'f'; readonly value: number }
  | { readonly type: 's'; readonly value: string }
  | { readonly type: 'b'; readonly value: Buffer };

export type OscValue = OscArgument['value'];

export interface OscMessage {
  readonly address: string;
  readonly args: readonly OscArgument[];
}

/**
 * A bundle element is either a message or a nested bundle.
 */
export interface OscBundle {
  readonly timeTag: bigint;
  readonly elements: readonly (OscMessage | OscBundle)[];
}

/** A UDP peer. */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}
