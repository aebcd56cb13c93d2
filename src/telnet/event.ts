import type { Verb } from "./code.js";

type EventBase<T extends string> = { type: T };

// Literal bytes with IAC IAC already collapsed
export type DataEvent = EventBase<"data"> & { data: Uint8Array };

// IAC DO <option>, IAC DONT <option>, IAC WILL <option>, IAC WONT <option>
export type NegotiationEvent = EventBase<"negotiation"> & {
  verb: Verb;
  option: number;
};

// IAC SB <option> <...data> IAC SE
export type SubnegotiationEvent = EventBase<"subnegotiation"> & {
  option: number;
  data: Uint8Array;
};

// Single-byte commands like IAC NOP, IAC AYT, IAC GA
export type CommandEvent = EventBase<"command"> & {
  code: number;
};

export type ViolationReason =
  | "UNKNOWN_COMMAND"
  | "BUFFER_OVERFLOW"
  | "INVALID_SUBNEGOTIATION"
  | "EMPTY_SUBNEGOTIATION";

// Malformed input the scanner skipped over; `bytes` are the offending bytes
export type ViolationEvent = EventBase<"violation"> & {
  reason: ViolationReason;
  bytes: Uint8Array;
};

export type TelnetEvent =
  | DataEvent
  | NegotiationEvent
  | SubnegotiationEvent
  | CommandEvent
  | ViolationEvent;

export const createEvent = {
  data: (data: Uint8Array): DataEvent => {
    return { type: "data", data };
  },

  negotiation: (verb: Verb, option: number): NegotiationEvent => {
    return { type: "negotiation", verb, option };
  },

  subnegotiation: (option: number, data: Uint8Array): SubnegotiationEvent => {
    return { type: "subnegotiation", option, data };
  },

  command: (code: number): CommandEvent => {
    return { type: "command", code };
  },

  violation: (reason: ViolationReason, bytes: Uint8Array): ViolationEvent => {
    return { type: "violation", reason, bytes };
  },
};

const eventTypes = new Set<string>([
  "data",
  "negotiation",
  "subnegotiation",
  "command",
  "violation",
]);

// Object-mode streams hand back untyped chunks
export function isTelnetEvent(value: unknown): value is TelnetEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    eventTypes.has(value.type)
  );
}
