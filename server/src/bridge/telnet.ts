export const IAC = 0xff;
export const DONT = 0xfe;
export const DO = 0xfd;
export const WONT = 0xfc;
export const WILL = 0xfb;
export const SB = 0xfa;
export const IP = 0xf4;
export const BRK = 0xf3;
export const SE = 0xf0;
/** IAC SUSP, sent by some clients for Ctrl-Z. */
export const SUSP = 0xed;

const CTRL_C = 0x03;
const CTRL_Z = 0x1a;

const COMMAND_TO_CONTROL: ReadonlyMap<number, number> = new Map([
  [BRK, CTRL_Z],
  [IP, CTRL_C],
  [SUSP, CTRL_Z],
]);

export type TelnetEvent =
  | { kind: 'negotiation'; command: number; option: number }
  | { kind: 'subnegotiation'; length: number }
  | { kind: 'control'; command: number; byte: number }
  | { kind: 'ignored'; command: number };

export interface DecodeResult {
  /** Application bytes, with every telnet command removed or mapped. */
  data: Buffer;
  /** Refusals to write back to the peer, in order. */
  replies: Buffer[];
  events: TelnetEvent[];
}

type DecoderState =
  | { mode: 'data' }
  | { mode: 'command' }
  | { mode: 'option'; command: number }
  | { mode: 'subnegotiation'; length: number; sawIac: boolean };

function refusalFor(command: number): number {
  return command === DO || command === DONT ? WONT : DONT;
}

/**
 * Inbound telnet parser for one connection. State carries over between
 * calls, so a sequence split across two reads decodes as if it arrived whole.
 */
export class TelnetDecoder {
  private state: DecoderState = { mode: 'data' };

  decode(chunk: Uint8Array): DecodeResult {
    const data: number[] = [];
    const replies: Buffer[] = [];
    const events: TelnetEvent[] = [];

    for (const byte of chunk) {
      const state = this.state;
      switch (state.mode) {
        case 'data':
          if (byte === IAC) {
            this.state = { mode: 'command' };
          } else {
            data.push(byte);
          }
          break;

        case 'command':
          this.state = { mode: 'data' };
          if (byte === IAC) {
            data.push(IAC);
          } else if (byte === DO || byte === DONT || byte === WILL || byte === WONT) {
            this.state = { mode: 'option', command: byte };
          } else if (byte === SB) {
            this.state = { mode: 'subnegotiation', length: 0, sawIac: false };
          } else {
            const control = COMMAND_TO_CONTROL.get(byte);
            if (control === undefined) {
              events.push({ kind: 'ignored', command: byte });
            } else {
              data.push(control);
              events.push({ kind: 'control', command: byte, byte: control });
            }
          }
          break;

        case 'option':
          this.state = { mode: 'data' };
          replies.push(Buffer.from([IAC, refusalFor(state.command), byte]));
          events.push({ kind: 'negotiation', command: state.command, option: byte });
          break;

        case 'subnegotiation':
          if (state.sawIac && byte === SE) {
            events.push({ kind: 'subnegotiation', length: state.length });
            this.state = { mode: 'data' };
          } else if (byte === IAC && !state.sawIac) {
            state.sawIac = true;
          } else {
            state.sawIac = false;
            state.length += 1;
          }
          break;
      }
    }

    return { data: Buffer.from(data), replies, events };
  }
}

/** Doubles every literal IAC byte for the outbound stream. */
export function telnetEscape(data: Buffer): Buffer {
  if (!data.includes(IAC)) return data;
  const escaped: number[] = [];
  for (const byte of data) {
    escaped.push(byte);
    if (byte === IAC) escaped.push(IAC);
  }
  return Buffer.from(escaped);
}

/** One byte per character, as the JSON transport carries raw terminal bytes. */
export function bytesToText(data: Buffer): string {
  return data.toString('latin1');
}

/** Characters above U+00FF do not fit a byte and are replaced with `?`. */
export function textToBytes(text: string): Buffer {
  const bytes: number[] = [];
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0x3f;
    bytes.push(code <= 0xff ? code : 0x3f);
  }
  return Buffer.from(bytes);
}
