/*
  Collects the body of IAC SB ... IAC SE.

  The scanner owns marker detection, so every byte handed to accumulate() is
  already literal (IAC IAC arrives here as a single 255). The first byte of
  a block is the option code, the rest is payload.

  The payload is bounded by maxSize. A peer that never sends IAC SE can only
  make us hold maxSize bytes before accumulate() reports "overflow" and the
  block is thrown away.
*/

export type AccumulateResult = "ok" | "overflow";

export type Subnegotiation = { option: number; data: Uint8Array };

export interface Assembler {
  begin: () => void;
  accumulate: (byte: number) => AccumulateResult;
  // null when the block ended before an option byte arrived
  finish: () => Subnegotiation | null;
  reset: () => void;
  bufferedLength: () => number;
}

const INITIAL_CAPACITY = 64;

export function createAssembler(maxSize: number): Assembler {
  let option: number | null = null;
  let buf = new Uint8Array(Math.min(INITIAL_CAPACITY, maxSize));
  let length = 0;

  const reset = (): void => {
    option = null;
    length = 0;
  };

  const accumulate = (byte: number): AccumulateResult => {
    if (option === null) {
      option = byte;
      return "ok";
    }

    if (length >= maxSize) {
      reset();
      return "overflow";
    }

    if (length === buf.length) {
      const grown = new Uint8Array(Math.min(buf.length * 2, maxSize));
      grown.set(buf);
      buf = grown;
    }

    buf[length++] = byte;
    return "ok";
  };

  const finish = (): Subnegotiation | null => {
    if (option === null) {
      return null;
    }
    const result = { option, data: buf.slice(0, length) };
    reset();
    return result;
  };

  return {
    begin: reset,
    accumulate,
    finish,
    reset,
    bufferedLength: () => length,
  };
}
