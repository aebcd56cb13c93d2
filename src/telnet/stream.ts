import { Transform } from "stream";
import { Connection, type ConnectionOptions } from "./connection.js";

/*
  Wraps a Connection in a Transform: raw bytes in, TelnetEvent objects out.

  Negotiation replies produced while feeding don't belong to the readable
  side, so they go to `onOutput`, which should write them to the peer.

  Example:

      const stream = createConnectionStream({
        onOutput: (bytes) => socket.write(bytes),
      });
      socket.pipe(stream).on("data", (event: TelnetEvent) => { ... });
*/

export type ConnectionStream = Transform & {
  connection: Connection;
};

export type ConnectionStreamOptions = ConnectionOptions & {
  onOutput: (bytes: Uint8Array) => void;
};

export function createConnectionStream({
  onOutput,
  ...options
}: ConnectionStreamOptions): ConnectionStream {
  const connection = new Connection(options);

  const stream = new Transform({
    readableObjectMode: true,
    transform(data: Uint8Array, _, done) {
      try {
        const { events, output } = connection.feed(data);
        if (output.length > 0) {
          onOutput(output);
        }
        for (const event of events) {
          this.push(event);
        }
        done();
      } catch (e) {
        done(e instanceof Error ? e : new Error(String(e)));
      }
    },
    flush(done) {
      const state = connection.scannerState();
      if (state !== "DATA") {
        this.emit("warning", `Stream ended in the middle of a sequence (${state})`);
      }
      done();
    },
  });

  return Object.assign(stream, { connection });
}
