import * as net from "net";
import { TelnetSession, type SessionOptions } from "./session.js";

export type ServerConfig = {
  port: number;
  host?: string;
  session?: SessionOptions;
  // Runs once per accepted connection; the socket closes when it settles
  onSession: (session: TelnetSession) => Promise<void> | void;
};

export function createServer(config: ServerConfig) {
  const server = net.createServer((socket) => {
    console.log("[server] client connected", {
      address: socket.remoteAddress,
      port: socket.remotePort,
    });

    const session = new TelnetSession(socket, config.session);

    socket.on("close", () => {
      console.log("[server] client closed", { address: socket.remoteAddress });
    });

    Promise.resolve()
      .then(() => config.onSession(session))
      .then(() => session.close())
      .catch((err) => {
        console.error("[server] session handler failed:", err);
        socket.destroy();
      });
  });

  function listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(config.port, config.host, () => {
        server.off("error", reject);
        resolve();
      });

      // Graceful shutdown handling
      process.on("SIGTERM", gracefulShutdown);
      process.on("SIGINT", gracefulShutdown);

      function gracefulShutdown() {
        console.log("[server] Shutting down gracefully...");
        server.close(() => {
          console.log("[server] closed");
          process.exit(0);
        });
      }
    });
  }

  return { listen, server };
}
