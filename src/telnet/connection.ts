import {
  ConnectionConfigSchema,
  type ConnectionConfigInput,
} from "../config.js";
import { concatBytes, encodeIntent, type OutboundIntent } from "./encoder.js";
import type { TelnetEvent } from "./event.js";
import {
  createNegotiator,
  type Direction,
  type NegotiationTable,
  type Negotiator,
  type OptionState,
  type SupportsOption,
} from "./negotiation.js";
import { createScanner, type Scanner, type ScannerState } from "./scanner.js";

/*
  The sans-I/O engine: one per telnet session.

  feed() takes bytes from the peer and returns the events they contain, plus
  any replies the negotiator decided to send. submit() turns caller intents
  into bytes. Neither call blocks or touches a socket; whoever owns the socket
  writes `output` and the result of submit() in the order they were returned.

  Example:

      const conn = new Connection({
        supports: (option) => option === TELNET.SUPPRESS_GO_AHEAD,
      });
      const { events, output } = conn.feed(socketBytes);
      socket.write(output);
      socket.write(conn.submit(createIntent.data(bytes)));
*/

export type ConnectionOptions = ConnectionConfigInput & {
  supports?: SupportsOption;
};

export type FeedResult = {
  events: TelnetEvent[];
  output: Uint8Array;
};

export class Connection {
  private readonly scanner: Scanner;
  private readonly negotiator: Negotiator;

  constructor({ supports, ...config }: ConnectionOptions = {}) {
    const { maxSubnegotiationSize, translateNewlines } =
      ConnectionConfigSchema.parse(config);
    this.scanner = createScanner({ maxSubnegotiationSize, translateNewlines });
    this.negotiator = createNegotiator(supports);
  }

  feed(bytes: Uint8Array): FeedResult {
    const events = this.scanner.feed(bytes);
    const replies: Uint8Array[] = [];
    for (const event of events) {
      if (event.type === "negotiation") {
        const reply = this.negotiator.onCommand(event.verb, event.option);
        if (reply) replies.push(reply);
      }
    }
    return { events, output: concatBytes(replies) };
  }

  submit(...intents: OutboundIntent[]): Uint8Array {
    return concatBytes(
      intents.map((intent) => encodeIntent(intent, this.negotiator)),
    );
  }

  getOptionState(direction: Direction, option: number): OptionState {
    return this.negotiator.getState(direction, option);
  }

  isEnabled(direction: Direction, option: number): boolean {
    return this.negotiator.isEnabled(direction, option);
  }

  options(): NegotiationTable {
    return this.negotiator.table();
  }

  scannerState(): ScannerState {
    return this.scanner.state();
  }
}
