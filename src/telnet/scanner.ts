import { TELNET, isControlCode, isVerb, type Verb } from "./code.js";
import { createEvent, type TelnetEvent } from "./event.js";
import { createAssembler } from "./subnegotiation.js";

/*
  Splits inbound bytes into data runs, negotiations, subnegotiations and
  single-byte commands.

  The scanner keeps an explicit resumable state between feed() calls instead
  of buffering raw input, so a feed boundary can fall anywhere: after an IAC,
  between a verb and its option, or in the middle of a subnegotiation body.
  Nothing partial is ever emitted. Data bytes seen in a feed are emitted at
  the end of that feed; they are never held back for the next one.

  Example:

      const scanner = createScanner({ maxSubnegotiationSize: 1024 });
      scanner.feed(Uint8Array.from([104, 105, TELNET.IAC]));
      // => [{ type: "data", data: [104, 105] }], state() === "MARKER_SEEN"
      scanner.feed(Uint8Array.from([TELNET.DO, TELNET.ECHO]));
      // => [{ type: "negotiation", verb: DO, option: ECHO }]
*/

export type ScannerState =
  | "DATA"
  | "MARKER_SEEN"
  | "COMMAND_AWAITING_OPTION"
  | "SUBNEG_COLLECTING"
  | "SUBNEG_MARKER_SEEN";

export type ScannerConfig = {
  maxSubnegotiationSize: number;
  // Decode NVT newlines: CR LF -> LF, CR NUL -> CR
  translateNewlines?: boolean;
};

export interface Scanner {
  feed: (bytes: Uint8Array) => TelnetEvent[];
  state: () => ScannerState;
  reset: () => void;
}

const NUL = 0;
const LF = 10;
const CR = 13;

export function createScanner({
  maxSubnegotiationSize,
  translateNewlines = false,
}: ScannerConfig): Scanner {
  const assembler = createAssembler(maxSubnegotiationSize);
  let state: ScannerState = "DATA";
  let verb: Verb | null = null;
  // CR seen at the end of the last data byte, waiting on its partner
  let pendingCR = false;

  const reset = (): void => {
    state = "DATA";
    verb = null;
    pendingCR = false;
    assembler.reset();
  };

  const feed = (bytes: Uint8Array): TelnetEvent[] => {
    const events: TelnetEvent[] = [];
    let run: number[] = [];

    const flush = (): void => {
      if (run.length > 0) {
        events.push(createEvent.data(Uint8Array.from(run)));
        run = [];
      }
    };

    const emit = (event: TelnetEvent): void => {
      flush();
      events.push(event);
    };

    const releaseCR = (): void => {
      if (pendingCR) {
        pendingCR = false;
        run.push(CR);
      }
    };

    const pushData = (byte: number): void => {
      if (!translateNewlines) {
        run.push(byte);
        return;
      }
      if (pendingCR) {
        pendingCR = false;
        if (byte === LF) {
          run.push(LF);
          return;
        }
        if (byte === NUL) {
          run.push(CR);
          return;
        }
        run.push(CR);
      }
      if (byte === CR) {
        pendingCR = true;
        return;
      }
      run.push(byte);
    };

    const collect = (byte: number): void => {
      if (assembler.accumulate(byte) === "overflow") {
        emit(createEvent.violation("BUFFER_OVERFLOW", Uint8Array.of(byte)));
        state = "DATA";
      }
    };

    for (let i = 0; i < bytes.length; i++) {
      const byte = bytes[i];

      switch (state) {
        case "DATA":
          if (byte === TELNET.IAC) {
            releaseCR();
            state = "MARKER_SEEN";
          } else {
            pushData(byte);
          }
          break;

        case "MARKER_SEEN":
          state = "DATA";
          if (byte === TELNET.IAC) {
            // IAC IAC = escaped IAC; it's part of the data
            pushData(TELNET.IAC);
          } else if (isVerb(byte)) {
            verb = byte;
            state = "COMMAND_AWAITING_OPTION";
          } else if (byte === TELNET.SB) {
            assembler.begin();
            state = "SUBNEG_COLLECTING";
          } else if (isControlCode(byte)) {
            emit(createEvent.command(byte));
          } else {
            emit(
              createEvent.violation(
                "UNKNOWN_COMMAND",
                Uint8Array.of(TELNET.IAC, byte),
              ),
            );
          }
          break;

        case "COMMAND_AWAITING_OPTION":
          state = "DATA";
          if (verb !== null) {
            emit(createEvent.negotiation(verb, byte));
            verb = null;
          }
          break;

        case "SUBNEG_COLLECTING":
          if (byte === TELNET.IAC) {
            state = "SUBNEG_MARKER_SEEN";
          } else {
            collect(byte);
          }
          break;

        case "SUBNEG_MARKER_SEEN":
          if (byte === TELNET.IAC) {
            state = "SUBNEG_COLLECTING";
            collect(TELNET.IAC);
          } else if (byte === TELNET.SE) {
            state = "DATA";
            const sub = assembler.finish();
            emit(
              sub
                ? createEvent.subnegotiation(sub.option, sub.data)
                : createEvent.violation(
                    "EMPTY_SUBNEGOTIATION",
                    Uint8Array.of(TELNET.IAC, TELNET.SE),
                  ),
            );
          } else {
            state = "DATA";
            assembler.reset();
            emit(
              createEvent.violation(
                "INVALID_SUBNEGOTIATION",
                Uint8Array.of(TELNET.IAC, byte),
              ),
            );
          }
          break;

        default: {
          const exhaustive: never = state;
          throw new Error(`Invalid scanner state: ${exhaustive}`);
        }
      }
    }

    flush();
    return events;
  };

  return { feed, state: () => state, reset };
}
