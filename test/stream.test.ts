import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { Readable } from "stream";
import {
  TELNET,
  createConnectionStream,
  createEvent,
  type TelnetEvent,
} from "../src/telnet/index.js";

function collect(
  stream: ReturnType<typeof createConnectionStream>,
): Promise<TelnetEvent[]> {
  const events: TelnetEvent[] = [];
  stream.on("data", (event: TelnetEvent) => {
    events.push(event);
  });
  return new Promise((resolve, reject) => {
    stream.on("end", () => resolve(events));
    stream.on("error", reject);
  });
}

describe("Connection stream", () => {
  test("turns piped bytes into events", async () => {
    const stream = createConnectionStream({ onOutput: () => {} });
    const readable = new Readable({
      read() {
        this.push(new Uint8Array([72, 101, 108, 108, 111])); // "Hello"
        this.push(new Uint8Array([TELNET.IAC, TELNET.NOP]));
        this.push(null);
      },
    });

    const done = collect(stream);
    readable.pipe(stream);

    assert.deepEqual(await done, [
      createEvent.data(new Uint8Array([72, 101, 108, 108, 111])),
      createEvent.command(TELNET.NOP),
    ]);
  });

  test("negotiation replies go to onOutput", async () => {
    const output: Uint8Array[] = [];
    const stream = createConnectionStream({
      supports: (option) => option === TELNET.ECHO,
      onOutput: (bytes) => output.push(bytes),
    });

    const done = collect(stream);
    stream.write(new Uint8Array([TELNET.IAC, TELNET.DO]));
    stream.write(new Uint8Array([TELNET.ECHO, TELNET.IAC, TELNET.WILL, 3]));
    stream.end();

    assert.deepEqual(await done, [
      createEvent.negotiation(TELNET.DO, TELNET.ECHO),
      createEvent.negotiation(TELNET.WILL, 3),
    ]);
    assert.deepEqual(output, [
      new Uint8Array([
        TELNET.IAC, TELNET.WILL, TELNET.ECHO,
        TELNET.IAC, TELNET.DONT, 3,
      ]),
    ]);
    assert.equal(stream.connection.isEnabled("local", TELNET.ECHO), true);
  });

  test("warns when the input ends mid-sequence", async () => {
    const stream = createConnectionStream({ onOutput: () => {} });
    const warnings: string[] = [];
    stream.on("warning", (message: string) => warnings.push(message));

    const done = collect(stream);
    stream.write(new Uint8Array([TELNET.IAC, TELNET.SB, 24, 1]));
    stream.end();
    await done;

    assert.deepEqual(warnings, [
      "Stream ended in the middle of a sequence (SUBNEG_COLLECTING)",
    ]);
  });

  test("passes connection settings through", async () => {
    const stream = createConnectionStream({
      maxSubnegotiationSize: 2,
      onOutput: () => {},
    });

    const done = collect(stream);
    stream.end(new Uint8Array([TELNET.IAC, TELNET.SB, 24, 1, 2, 3]));

    assert.deepEqual(await done, [
      createEvent.violation("BUFFER_OVERFLOW", new Uint8Array([3])),
    ]);
  });
});
