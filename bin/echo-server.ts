#!/usr/bin/env node
import { z } from "zod";
import "dotenv/config";
import { createServer } from "../src/server.js";
import { isEncodingSupported } from "../src/encoding.js";
import { TELNET, getCommandName } from "../src/telnet/index.js";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(2323),
  MAX_SUBNEGOTIATION_SIZE: z.coerce.number().int().positive().optional(),
  ENCODING: z
    .string()
    .optional()
    .default("auto")
    .transform((val) => val.toLowerCase())
    .refine((val) => val === "auto" || isEncodingSupported(val), {
      message: `Encoding must be "auto" or a string that iconv supports`,
    }),
  LOG_INCOMING_DATA: z.enum(["none", "all", "control"]).default("control"),
});

const env = EnvSchema.parse(process.env);

const server = createServer({
  port: env.PORT,
  session: {
    maxSubnegotiationSize: env.MAX_SUBNEGOTIATION_SIZE,
    translateNewlines: true,
    encoding: env.ENCODING,
    logIncomingData: env.LOG_INCOMING_DATA,
    supports: (option) => option === TELNET.SUPPRESS_GO_AHEAD,
    onCommand: (event, session) => {
      if (event.code === TELNET.AYT) {
        session.sendText("[yes]\r\n");
      } else {
        console.log(`[echo] ignoring IAC ${getCommandName(event.code)}`);
      }
    },
    onViolation: (event) => {
      console.warn(`[echo] protocol violation: ${event.reason}`);
    },
  },
  onSession: async (session) => {
    session.requestOption("local", TELNET.SUPPRESS_GO_AHEAD, true);
    session.sendText("Welcome! Everything you type is sent back.\r\n");
    for await (const text of session.text()) {
      session.sendText(text.replace(/\n/g, "\r\n"));
    }
    console.log("[echo] session done", {
      suppressGoAhead: session.isEnabled("local", TELNET.SUPPRESS_GO_AHEAD),
    });
  },
});

server
  .listen()
  .then(() => {
    console.log(`Listening on port ${env.PORT}...`);
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
