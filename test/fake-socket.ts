import { Duplex } from "stream";

// In-process stand-in for a net.Socket: push() is what the peer sent,
// written() is everything written back.
export function createFakeSocket() {
  const chunks: Uint8Array[] = [];
  const socket = new Duplex({
    read() {},
    write(chunk: Uint8Array, _encoding, done) {
      chunks.push(chunk);
      done();
    },
  });
  const written = (): Uint8Array => new Uint8Array(Buffer.concat(chunks));
  return { socket, written };
}
