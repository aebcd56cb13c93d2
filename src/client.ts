import * as net from "net";
import type { Duplex } from "stream";
import { TelnetSession, type SessionOptions } from "./session.js";
import { TelnetError, type SubnegotiationEvent } from "./telnet/index.js";

/*
  Pull-style reads over a TelnetSession, for scripting a remote host:

      const client = await connect({ host: "127.0.0.1", port: 23 });
      await client.readUntil("login: ", 5000);
      client.session.sendText("guest\r\n");
      const { index } = await client.expect([/\$ $/, /incorrect/], 5000);

  The client consumes the session's data itself, so don't also iterate
  `client.session`. Negotiation still follows the session options
  (`supports`, `onNegotiation`, ...), which refuse every option by default.

  Matching works on raw bytes. String arguments and regular expressions are
  applied to the bytes read as latin1, one character per byte, so patterns
  for non-ASCII text should be written in terms of those bytes.
*/

export type ExpectResult = {
  // Index of the first pattern that matched, -1 when none did
  index: number;
  match: RegExpExecArray | null;
  // Everything consumed, up to and including the match
  data: Uint8Array;
};

export class TelnetClient {
  readonly session: TelnetSession;
  private buffered: Buffer = Buffer.alloc(0);
  private subnegotiations: SubnegotiationEvent[] = [];
  private eof = false;
  private failure: Error | null = null;
  private readonly waiters = new Set<() => void>();

  constructor(socket: Duplex, options: SessionOptions = {}) {
    this.session = new TelnetSession(socket, {
      ...options,
      onSubnegotiation: (event, session) => {
        this.subnegotiations.push(event);
        options.onSubnegotiation?.(event, session);
      },
    });
    this.pump().catch((err: unknown) => {
      console.error("[client] read failed:", err);
      this.failure = err instanceof Error ? err : new Error(String(err));
      this.finish();
    });
  }

  /** Bytes up to and including `match`, or whatever arrived before the timeout or EOF. */
  async readUntil(
    match: Uint8Array | string,
    timeoutMs?: number,
  ): Promise<Uint8Array> {
    const needle =
      typeof match === "string" ? Buffer.from(match, "latin1") : match;
    const deadline = deadlineFor(timeoutMs);
    for (;;) {
      const at = this.buffered.indexOf(needle);
      if (at >= 0) {
        return this.take(at + needle.length);
      }
      if (!(await this.waitForData(deadline))) {
        return this.readEager();
      }
    }
  }

  /**
   * Waits until one of `patterns` matches the buffered data and consumes
   * through the end of the match. Patterns are tried in order on every
   * arrival. With no match by the timeout or EOF, returns index -1 and
   * consumes everything buffered.
   */
  async expect(patterns: RegExp[], timeoutMs?: number): Promise<ExpectResult> {
    // Non-global copies, so the caller's lastIndex is left alone
    const compiled = patterns.map(
      (pattern) => new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")),
    );
    const deadline = deadlineFor(timeoutMs);
    for (;;) {
      const text = this.buffered.toString("latin1");
      for (const [index, pattern] of compiled.entries()) {
        const match = pattern.exec(text);
        if (match) {
          return {
            index,
            match,
            data: this.take(match.index + match[0].length),
          };
        }
      }
      if (!(await this.waitForData(deadline))) {
        return { index: -1, match: null, data: this.readEager() };
      }
    }
  }

  /** Everything buffered right now. Throws once the connection is closed and drained. */
  readEager(): Uint8Array {
    if (this.buffered.length === 0 && this.eof) {
      throw (
        this.failure ??
        new TelnetError("Telnet connection closed", "CONNECTION_CLOSED")
      );
    }
    return this.take(this.buffered.length);
  }

  /** Waits for at least one byte. Empty once the connection is closed. */
  async readSome(): Promise<Uint8Array> {
    while (this.buffered.length === 0 && !this.eof) {
      await this.waitForData(undefined);
    }
    return this.take(this.buffered.length);
  }

  /** Waits for the peer to close, then returns everything left. */
  async readAll(): Promise<Uint8Array> {
    while (!this.eof) {
      await this.waitForData(undefined);
    }
    return this.take(this.buffered.length);
  }

  /** Subnegotiations received since the last call, oldest first. */
  readSubnegotiations(): SubnegotiationEvent[] {
    const events = this.subnegotiations;
    this.subnegotiations = [];
    return events;
  }

  closed(): boolean {
    return this.eof;
  }

  close(): void {
    this.session.close();
  }

  private async pump(): Promise<void> {
    for await (const data of this.session) {
      this.buffered = Buffer.concat([this.buffered, data]);
      this.notify();
    }
    this.finish();
  }

  private finish(): void {
    this.eof = true;
    this.notify();
  }

  private take(length: number): Uint8Array {
    const out = new Uint8Array(this.buffered.subarray(0, length));
    this.buffered = this.buffered.subarray(length);
    return out;
  }

  private notify(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }

  // Resolves true when more data (or EOF) arrived, false when there is
  // nothing left to wait for
  private waitForData(deadline: number | undefined): Promise<boolean> {
    if (this.eof) {
      return Promise.resolve(false);
    }
    const remaining = deadline === undefined ? undefined : deadline - Date.now();
    if (remaining !== undefined && remaining <= 0) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      const done = (arrived: boolean) => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        resolve(arrived);
      };
      const wake = () => done(true);
      const timer =
        remaining === undefined ? undefined : setTimeout(() => done(false), remaining);
      this.waiters.add(wake);
    });
  }
}

function deadlineFor(timeoutMs: number | undefined): number | undefined {
  return timeoutMs === undefined ? undefined : Date.now() + timeoutMs;
}

export type ConnectOptions = SessionOptions & {
  host: string;
  port: number;
  // Applies to establishing the connection only
  timeoutMs?: number;
};

export function connect({
  host,
  port,
  timeoutMs,
  ...options
}: ConnectOptions): Promise<TelnetClient> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });

    const fail = (error: Error) => {
      socket.destroy();
      reject(error);
    };
    const onTimeout = () =>
      fail(
        new TelnetError(
          `Timed out connecting to ${host}:${port}`,
          "CONNECT_TIMEOUT",
        ),
      );
    socket.once("error", fail);
    if (timeoutMs !== undefined) {
      socket.setTimeout(timeoutMs, onTimeout);
    }

    socket.once("connect", () => {
      socket.off("error", fail);
      socket.off("timeout", onTimeout);
      socket.setTimeout(0);
      console.log("[client] connected", { host, port });
      resolve(new TelnetClient(socket, options));
    });
  });
}
