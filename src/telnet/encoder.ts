import { TELNET, isControlCode, isOption, type Verb } from "./code.js";
import { TelnetError } from "./errors.js";
import type { Direction, Negotiator } from "./negotiation.js";

export type OutboundIntent =
  | { type: "data"; data: Uint8Array }
  | { type: "option"; direction: Direction; option: number; enable: boolean }
  | { type: "subnegotiation"; option: number; data: Uint8Array }
  | { type: "command"; code: number };

export const createIntent = {
  data: (data: Uint8Array): OutboundIntent => ({ type: "data", data }),

  option: (
    direction: Direction,
    option: number,
    enable: boolean,
  ): OutboundIntent => ({ type: "option", direction, option, enable }),

  subnegotiation: (option: number, data: Uint8Array): OutboundIntent => ({
    type: "subnegotiation",
    option,
    data,
  }),

  command: (code: number): OutboundIntent => ({ type: "command", code }),
};

const EMPTY = new Uint8Array(0);

// Escape IAC bytes in user data for telnet transmission
//
// In telnet protocol, the byte 255 (0xFF) is reserved as IAC (Interpret As Command).
// When user data contains this byte value, it must be escaped by doubling it.
// Example: [1, 255, 3] becomes [1, 255, 255, 3]
export function escapeIAC(data: Uint8Array): Uint8Array {
  let count = 0;
  for (let i = 0; i < data.length; i++) {
    if (data[i] === TELNET.IAC) count++;
  }

  // No IAC bytes, so we can return the original data
  if (count === 0) {
    return data;
  }

  const escaped = new Uint8Array(data.length + count);
  let writeIndex = 0;
  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    escaped[writeIndex++] = byte;
    if (byte === TELNET.IAC) {
      escaped[writeIndex++] = TELNET.IAC;
    }
  }
  return escaped;
}

// IAC <verb> <option>; the option byte is never escaped
export function encodeNegotiation(verb: Verb, option: number): Uint8Array {
  return Uint8Array.of(TELNET.IAC, verb, option);
}

// IAC SB <option> <...data> IAC SE
//
// The option byte is escaped along with the payload, so option 255 goes out
// as IAC SB IAC IAC ... IAC SE.
export function encodeSubnegotiation(
  option: number,
  data: Uint8Array,
): Uint8Array {
  assertOption(option);
  const body = new Uint8Array(data.length + 1);
  body[0] = option;
  body.set(data, 1);
  const escaped = escapeIAC(body);

  const out = new Uint8Array(escaped.length + 4);
  out[0] = TELNET.IAC;
  out[1] = TELNET.SB;
  out.set(escaped, 2);
  out[out.length - 2] = TELNET.IAC;
  out[out.length - 1] = TELNET.SE;
  return out;
}

export function encodeCommand(code: number): Uint8Array {
  if (!isControlCode(code)) {
    throw new TelnetError(
      `Not a single-byte telnet command: ${code}`,
      "INVALID_COMMAND",
    );
  }
  return Uint8Array.of(TELNET.IAC, code);
}

// Option intents go through the negotiator, which may decide no bytes are needed
export function encodeIntent(
  intent: OutboundIntent,
  negotiator: Negotiator,
): Uint8Array {
  switch (intent.type) {
    case "data":
      return escapeIAC(intent.data);
    case "option":
      return (
        negotiator.onRequest(intent.direction, intent.option, intent.enable) ??
        EMPTY
      );
    case "subnegotiation":
      return encodeSubnegotiation(intent.option, intent.data);
    case "command":
      return encodeCommand(intent.code);
    default: {
      const exhaustive: never = intent;
      throw new Error(`Invalid intent: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export function concatBytes(parts: Uint8Array[]): Uint8Array {
  if (parts.length === 1) return parts[0];
  let total = 0;
  for (const part of parts) total += part.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function assertOption(option: number): void {
  if (!isOption(option)) {
    throw new TelnetError(`Invalid option: ${option}`, "INVALID_OPTION");
  }
}
