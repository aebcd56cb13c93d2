import { describe, test } from "node:test";
import assert from "node:assert/strict";
import {
  TELNET,
  TelnetError,
  createIntent,
  createNegotiator,
  encodeCommand,
  encodeIntent,
  encodeNegotiation,
  encodeSubnegotiation,
  escapeIAC,
} from "../src/telnet/index.js";

describe("escapeIAC", () => {
  test("doubles every IAC byte", () => {
    assert.deepEqual(
      escapeIAC(new Uint8Array([1, 255, 3, 255, 255])),
      new Uint8Array([1, 255, 255, 3, 255, 255, 255, 255]),
    );
  });

  test("returns the input untouched when there is nothing to escape", () => {
    const data = new Uint8Array([104, 105]);
    assert.equal(escapeIAC(data), data);
  });

  test("empty input", () => {
    assert.deepEqual(escapeIAC(new Uint8Array([])), new Uint8Array([]));
  });
});

describe("encode helpers", () => {
  test("negotiation is three bytes with a raw option", () => {
    assert.deepEqual(
      encodeNegotiation(TELNET.WONT, 255),
      new Uint8Array([TELNET.IAC, TELNET.WONT, 255]),
    );
  });

  test("subnegotiation is framed and escaped", () => {
    assert.deepEqual(
      encodeSubnegotiation(24, new Uint8Array([0xff, 0x41])),
      new Uint8Array([
        TELNET.IAC, TELNET.SB, 24,
        TELNET.IAC, TELNET.IAC, 0x41,
        TELNET.IAC, TELNET.SE,
      ]),
    );
  });

  test("subnegotiation for option 255 escapes the option byte", () => {
    assert.deepEqual(
      encodeSubnegotiation(255, new Uint8Array([1])),
      new Uint8Array([
        TELNET.IAC, TELNET.SB, TELNET.IAC, TELNET.IAC, 1,
        TELNET.IAC, TELNET.SE,
      ]),
    );
  });

  test("single-byte commands", () => {
    assert.deepEqual(
      encodeCommand(TELNET.GA),
      new Uint8Array([TELNET.IAC, TELNET.GA]),
    );
    assert.throws(
      () => encodeCommand(TELNET.WILL),
      (err: unknown) =>
        err instanceof TelnetError && err.code === "INVALID_COMMAND",
    );
  });

  test("subnegotiation rejects an invalid option", () => {
    assert.throws(
      () => encodeSubnegotiation(-1, new Uint8Array([])),
      (err: unknown) =>
        err instanceof TelnetError && err.code === "INVALID_OPTION",
    );
  });
});

describe("encodeIntent", () => {
  test("data intent escapes IAC", () => {
    const n = createNegotiator();
    assert.deepEqual(
      encodeIntent(createIntent.data(new Uint8Array([255])), n),
      new Uint8Array([255, 255]),
    );
  });

  test("option intent goes through the negotiator", () => {
    const n = createNegotiator();
    assert.deepEqual(
      encodeIntent(createIntent.option("local", TELNET.ECHO, true), n),
      new Uint8Array([TELNET.IAC, TELNET.WILL, TELNET.ECHO]),
    );
    assert.deepEqual(
      encodeIntent(createIntent.option("local", TELNET.ECHO, true), n),
      new Uint8Array([]),
    );
    assert.equal(n.getState("local", TELNET.ECHO), "WANT_YES");
  });

  test("disabling an option that is already off produces nothing", () => {
    const n = createNegotiator();
    assert.deepEqual(
      encodeIntent(createIntent.option("remote", TELNET.ECHO, false), n),
      new Uint8Array([]),
    );
  });

  test("command intent", () => {
    const n = createNegotiator();
    assert.deepEqual(
      encodeIntent(createIntent.command(TELNET.NOP), n),
      new Uint8Array([TELNET.IAC, TELNET.NOP]),
    );
  });
});
