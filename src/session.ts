import type { Duplex } from "stream";
import { createTextCodec, type TextCodec } from "./encoding.js";
import {
  createConnectionStream,
  createIntent,
  getCommandName,
  getOptionName,
  isTelnetEvent,
  type CommandEvent,
  type Connection,
  type ConnectionOptions,
  type ConnectionStream,
  type Direction,
  type NegotiationEvent,
  type SubnegotiationEvent,
  type TelnetEvent,
  type ViolationEvent,
} from "./telnet/index.js";

/*
  Drives a Connection from a Node byte stream (usually a net.Socket).

  Iterating a session yields the data the peer sent, with every protocol
  sequence already handled: negotiation replies are written back to the
  socket as they are produced, and other events go to the callbacks.

      const session = new TelnetSession(socket, {
        supports: (option) => option === TELNET.SUPPRESS_GO_AHEAD,
      });
      session.sendText("Welcome!\r\n");
      for await (const data of session) {
        session.send(data);
      }
*/

// control is negotiation and commands like AYT, GA, etc. since other data is noisy
export type LogIncomingData = "none" | "all" | "control";

export type SessionOptions = ConnectionOptions & {
  encoding?: string;
  logIncomingData?: LogIncomingData;
  onNegotiation?: (event: NegotiationEvent, session: TelnetSession) => void;
  onSubnegotiation?: (
    event: SubnegotiationEvent,
    session: TelnetSession,
  ) => void;
  onCommand?: (event: CommandEvent, session: TelnetSession) => void;
  onViolation?: (event: ViolationEvent, session: TelnetSession) => void;
};

export class TelnetSession {
  readonly connection: Connection;
  private readonly stream: ConnectionStream;
  private readonly codec: TextCodec;
  private readonly options: SessionOptions;

  constructor(
    private readonly socket: Duplex,
    options: SessionOptions = {},
  ) {
    this.options = options;
    this.codec = createTextCodec(options.encoding);
    // Connection only reads its own settings and ignores the rest
    this.stream = createConnectionStream({
      ...options,
      onOutput: (bytes) => this.write(bytes),
    });
    this.connection = this.stream.connection;

    socket.pipe(this.stream);

    socket.on("error", (error) => {
      if (
        "code" in error &&
        (error.code === "EPIPE" || error.code === "ECONNRESET")
      ) {
        // Not an error
        console.log(`[session] connection closed unexpectedly: ${error.code}`);
      } else {
        console.error("[session] connection error:", error);
      }
    });

    // An errored socket never emits 'end', so iteration has to be released here
    socket.on("close", () => {
      if (!this.stream.writableEnded) {
        this.stream.end();
      }
    });

    this.stream.on("warning", (message) => {
      console.warn(`[session] ${message}`);
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    for await (const chunk of this.stream) {
      if (!isTelnetEvent(chunk)) {
        continue;
      }
      this.log(chunk);
      if (chunk.type === "data") {
        yield chunk.data;
      } else {
        this.dispatch(chunk);
      }
    }
  }

  // Same as iterating the session, decoded with the session's encoding.
  // A character split across reads comes out whole in a later chunk.
  async *text(): AsyncGenerator<string, void, undefined> {
    for await (const data of this) {
      const text = this.codec.decode(data);
      if (text) {
        yield text;
      }
    }
    const rest = this.codec.end();
    if (rest) {
      yield rest;
    }
  }

  send(data: Uint8Array): void {
    this.write(this.connection.submit(createIntent.data(data)));
  }

  sendText(text: string): void {
    this.send(this.codec.encode(text));
  }

  requestOption(direction: Direction, option: number, enable: boolean): void {
    this.write(
      this.connection.submit(createIntent.option(direction, option, enable)),
    );
  }

  sendSubnegotiation(option: number, data: Uint8Array): void {
    this.write(
      this.connection.submit(createIntent.subnegotiation(option, data)),
    );
  }

  sendCommand(code: number): void {
    this.write(this.connection.submit(createIntent.command(code)));
  }

  isEnabled(direction: Direction, option: number): boolean {
    return this.connection.isEnabled(direction, option);
  }

  encoding(): string {
    return this.codec.encoding();
  }

  close(): void {
    this.socket.end();
  }

  private write(bytes: Uint8Array): void {
    if (bytes.length === 0) {
      return;
    }
    // Only write if the connection is still open
    if (!this.socket.destroyed && this.socket.writable) {
      this.socket.write(bytes);
    }
  }

  private dispatch(event: Exclude<TelnetEvent, { type: "data" }>): void {
    switch (event.type) {
      case "negotiation":
        this.options.onNegotiation?.(event, this);
        break;
      case "subnegotiation":
        this.options.onSubnegotiation?.(event, this);
        break;
      case "command":
        this.options.onCommand?.(event, this);
        break;
      case "violation":
        this.options.onViolation?.(event, this);
        break;
      default: {
        const exhaustive: never = event;
        throw new Error(`Invalid event type: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private log(event: TelnetEvent): void {
    const level = this.options.logIncomingData ?? "control";
    switch (level) {
      case "none":
        break;
      case "all":
        console.log("[session] recv", prettyEvent(event));
        break;
      case "control":
        if (event.type !== "data") {
          console.log("[session] recv", prettyEvent(event));
        }
        break;
      default: {
        const exhaustive: never = level;
        throw new Error(`Invalid logIncomingData: ${exhaustive}`);
      }
    }
  }
}

export type PrettyEvent = {
  type: TelnetEvent["type"];
  name?: string;
  optionName?: string;
  reason?: string;
  dataText?: string;
  dataLength?: number;
};

// Friendly names for logging
export function prettyEvent(event: TelnetEvent): PrettyEvent {
  switch (event.type) {
    case "data":
      return {
        type: event.type,
        dataText: new TextDecoder().decode(event.data),
        dataLength: event.data.length,
      };
    case "negotiation":
      return {
        type: event.type,
        name: getCommandName(event.verb),
        optionName: getOptionName(event.option),
      };
    case "subnegotiation":
      return {
        type: event.type,
        optionName: getOptionName(event.option),
        dataLength: event.data.length,
      };
    case "command":
      return { type: event.type, name: getCommandName(event.code) };
    case "violation":
      return {
        type: event.type,
        reason: event.reason,
        dataLength: event.bytes.length,
      };
    default: {
      const exhaustive: never = event;
      throw new Error(`Invalid event: ${JSON.stringify(exhaustive)}`);
    }
  }
}
