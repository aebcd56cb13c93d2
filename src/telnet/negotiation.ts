import { TELNET, isOption, type Verb } from "./code.js";
import { encodeNegotiation } from "./encoder.js";
import { TelnetError } from "./errors.js";

/*
  Option negotiation per RFC 1143 ("the Q method").

  Every option has two independent six-state machines: `local` (WILL/WONT,
  what we do) and `remote` (DO/DONT, what we ask the peer to do). We never
  send a request while one is outstanding for the same option and direction,
  and we never answer a message that doesn't change the state. Together those
  two rules keep two compliant peers from negotiating forever.

  Inbound verbs map onto the machines like so:

      WILL -> remote, enable     DO   -> local, enable
      WONT -> remote, disable    DONT -> local, disable
*/

export type OptionState =
  | "NO"
  | "YES"
  | "WANT_NO"
  | "WANT_NO_QUEUED"
  | "WANT_YES"
  | "WANT_YES_QUEUED";

export type Direction = "local" | "remote";

type Signal = "enable" | "disable";

type Transition = { next: OptionState; send: Signal | null };

export type OptionEntry = { local: OptionState; remote: OptionState };

export type NegotiationTable = ReadonlyMap<number, Readonly<OptionEntry>>;

// Decides whether we agree when the peer asks to enable an option
export type SupportsOption = (option: number, direction: Direction) => boolean;

const refuseAll: SupportsOption = () => false;

// The peer sent WILL/WONT (remote) or DO/DONT (local)
export function onPeerSignal(
  state: OptionState,
  signal: Signal,
  accept: () => boolean,
): Transition {
  const enable = signal === "enable";
  switch (state) {
    case "NO":
      if (!enable) return { next: "NO", send: null };
      return accept()
        ? { next: "YES", send: "enable" }
        : { next: "NO", send: "disable" };
    case "YES":
      return enable
        ? { next: "YES", send: null }
        : { next: "NO", send: "disable" };
    case "WANT_NO":
      return { next: "NO", send: null };
    case "WANT_NO_QUEUED":
      // Disable acknowledged: ask for the queued enable. An enable answering
      // our disable is a peer error, but it leaves the option on.
      return enable
        ? { next: "YES", send: null }
        : { next: "WANT_YES", send: "enable" };
    case "WANT_YES":
      return enable
        ? { next: "YES", send: null }
        : { next: "NO", send: null };
    case "WANT_YES_QUEUED":
      return enable
        ? { next: "WANT_NO", send: "disable" }
        : { next: "NO", send: null };
    default: {
      const exhaustive: never = state;
      throw new Error(`Invalid option state: ${exhaustive}`);
    }
  }
}

// The caller asked to enable or disable an option
export function onCallerSignal(
  state: OptionState,
  signal: Signal,
): Transition {
  const enable = signal === "enable";
  switch (state) {
    case "NO":
      return enable
        ? { next: "WANT_YES", send: "enable" }
        : { next: "NO", send: null };
    case "YES":
      return enable
        ? { next: "YES", send: null }
        : { next: "WANT_NO", send: "disable" };
    case "WANT_NO":
      return { next: enable ? "WANT_NO_QUEUED" : "WANT_NO", send: null };
    case "WANT_NO_QUEUED":
      return { next: enable ? "WANT_NO_QUEUED" : "WANT_NO", send: null };
    case "WANT_YES":
      return { next: enable ? "WANT_YES" : "WANT_YES_QUEUED", send: null };
    case "WANT_YES_QUEUED":
      return { next: enable ? "WANT_YES" : "WANT_YES_QUEUED", send: null };
    default: {
      const exhaustive: never = state;
      throw new Error(`Invalid option state: ${exhaustive}`);
    }
  }
}

function verbFor(direction: Direction, signal: Signal): Verb {
  if (direction === "local") {
    return signal === "enable" ? TELNET.WILL : TELNET.WONT;
  }
  return signal === "enable" ? TELNET.DO : TELNET.DONT;
}

function signalFor(verb: Verb): { direction: Direction; signal: Signal } {
  switch (verb) {
    case TELNET.WILL:
      return { direction: "remote", signal: "enable" };
    case TELNET.WONT:
      return { direction: "remote", signal: "disable" };
    case TELNET.DO:
      return { direction: "local", signal: "enable" };
    case TELNET.DONT:
      return { direction: "local", signal: "disable" };
    default: {
      const exhaustive: never = verb;
      throw new Error(`Unexpected negotiation verb: ${exhaustive}`);
    }
  }
}

export interface Negotiator {
  onCommand: (verb: Verb, option: number) => Uint8Array | null;
  onRequest: (
    direction: Direction,
    option: number,
    enable: boolean,
  ) => Uint8Array | null;
  getState: (direction: Direction, option: number) => OptionState;
  isEnabled: (direction: Direction, option: number) => boolean;
  table: () => NegotiationTable;
}

export function createNegotiator(
  supports: SupportsOption = refuseAll,
): Negotiator {
  const options = new Map<number, OptionEntry>();

  const entry = (option: number): OptionEntry => {
    let found = options.get(option);
    if (!found) {
      found = { local: "NO", remote: "NO" };
      options.set(option, found);
    }
    return found;
  };

  const apply = (
    direction: Direction,
    option: number,
    { next, send }: Transition,
  ): Uint8Array | null => {
    entry(option)[direction] = next;
    return send ? encodeNegotiation(verbFor(direction, send), option) : null;
  };

  const onCommand = (verb: Verb, option: number): Uint8Array | null => {
    const { direction, signal } = signalFor(verb);
    const transition = onPeerSignal(entry(option)[direction], signal, () =>
      supports(option, direction),
    );
    return apply(direction, option, transition);
  };

  const onRequest = (
    direction: Direction,
    option: number,
    enable: boolean,
  ): Uint8Array | null => {
    if (!isOption(option)) {
      throw new TelnetError(`Invalid option: ${option}`, "INVALID_OPTION");
    }
    const transition = onCallerSignal(
      entry(option)[direction],
      enable ? "enable" : "disable",
    );
    return apply(direction, option, transition);
  };

  const getState = (direction: Direction, option: number): OptionState =>
    options.get(option)?.[direction] ?? "NO";

  return {
    onCommand,
    onRequest,
    getState,
    isEnabled: (direction, option) => getState(direction, option) === "YES",
    // Snapshot, so callers can't move state behind the machine's back
    table: () =>
      new Map(
        [...options].map(([option, { local, remote }]) => [
          option,
          { local, remote },
        ]),
      ),
  };
}
