import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { TelnetClient } from "../src/client.js";
import { TELNET, TelnetError, createEvent } from "../src/telnet/index.js";
import { createFakeSocket } from "./fake-socket.js";

const bytes = (text: string) => new Uint8Array(Buffer.from(text, "latin1"));

function createClient() {
  const { socket, written } = createFakeSocket();
  const client = new TelnetClient(socket, { logIncomingData: "none" });
  return { socket, written, client };
}

describe("TelnetClient - readUntil", () => {
  test("returns through the match and keeps the rest buffered", async () => {
    const { socket, client } = createClient();
    socket.push(Buffer.from("Welcome\r\nlogin: rest"));

    assert.deepEqual(await client.readUntil("login: "), bytes("Welcome\r\nlogin: "));
    assert.deepEqual(client.readEager(), bytes("rest"));
  });

  test("finds a match split across reads", async () => {
    const { socket, client } = createClient();
    socket.push(Buffer.from("lo"));
    setImmediate(() => socket.push(Buffer.from("gin: x")));

    assert.deepEqual(await client.readUntil(bytes("login:")), bytes("login:"));
  });

  test("returns what arrived when the timeout passes", async () => {
    const { socket, client } = createClient();
    socket.push(Buffer.from("partial"));

    assert.deepEqual(await client.readUntil("$ ", 30), bytes("partial"));
    assert.equal(client.closed(), false);
  });

  test("returns the remainder at EOF, then reports the closed connection", async () => {
    const { socket, client } = createClient();
    socket.push(Buffer.from("abc"));
    socket.push(null);

    assert.deepEqual(await client.readUntil("zzz"), bytes("abc"));
    await assert.rejects(
      client.readUntil("zzz"),
      (err: unknown) =>
        err instanceof TelnetError && err.code === "CONNECTION_CLOSED",
    );
    assert.equal(client.closed(), true);
  });
});

describe("TelnetClient - expect", () => {
  test("reports the first pattern that matches", async () => {
    const { socket, client } = createClient();
    socket.push(Buffer.from("user> "));

    const result = await client.expect([/password:/, /(\w+)> $/]);

    assert.equal(result.index, 1);
    assert.equal(result.match?.[1], "user");
    assert.deepEqual(result.data, bytes("user> "));
  });

  test("leaves a global pattern's lastIndex alone", async () => {
    const { socket, client } = createClient();
    const prompt = /> /g;
    socket.push(Buffer.from("a> b> "));

    assert.equal((await client.expect([prompt])).index, 0);
    assert.equal(prompt.lastIndex, 0);
    assert.deepEqual(client.readEager(), bytes("b> "));
  });

  test("gives index -1 and the buffered data on timeout", async () => {
    const { socket, client } = createClient();
    socket.push(Buffer.from("nothing"));

    assert.deepEqual(await client.expect([/x/], 30), {
      index: -1,
      match: null,
      data: bytes("nothing"),
    });
  });
});

describe("TelnetClient - reads", () => {
  test("readAll waits for EOF", async () => {
    const { socket, client } = createClient();
    socket.push(Buffer.from("a"));
    setImmediate(() => {
      socket.push(Buffer.from("b"));
      socket.push(null);
    });

    assert.deepEqual(await client.readAll(), bytes("ab"));
    assert.deepEqual(await client.readSome(), new Uint8Array([]));
  });

  test("readSome waits for the first byte", async () => {
    const { socket, client } = createClient();
    setImmediate(() => socket.push(Buffer.from("hi")));

    assert.deepEqual(await client.readSome(), bytes("hi"));
  });

  test("negotiation is answered and subnegotiations are queued", async () => {
    const { socket, written, client } = createClient();
    socket.push(
      Buffer.from([
        TELNET.IAC, TELNET.DO, TELNET.ECHO,
        TELNET.IAC, TELNET.SB, TELNET.TERMINAL_TYPE, 1, TELNET.IAC, TELNET.SE,
        111, 107,
      ]),
    );

    assert.deepEqual(await client.readUntil("ok"), bytes("ok"));
    assert.deepEqual(
      written(),
      new Uint8Array([TELNET.IAC, TELNET.WONT, TELNET.ECHO]),
    );
    assert.deepEqual(client.readSubnegotiations(), [
      createEvent.subnegotiation(TELNET.TERMINAL_TYPE, new Uint8Array([1])),
    ]);
    assert.deepEqual(client.readSubnegotiations(), []);
  });
});
