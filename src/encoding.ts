import iconv from "iconv-lite";

// Functions in this file expect encoding to be lowercase

export function isEncodingSupported(encoding: string): boolean {
  return iconv.encodingExists(encoding);
}

const nativeEncodings = new Set([
  "utf8",
  "utf-8",
  "latin1",
  "iso-8859-1",
  "iso88591",
]);

function normalizeNative(encoding: string): "utf8" | "latin1" {
  return encoding === "utf8" || encoding === "utf-8" ? "utf8" : "latin1";
}

/** Encode a string into bytes using an encoding */
export function encodeText(text: string, encoding: string): Uint8Array {
  if (nativeEncodings.has(encoding)) {
    return normalizeNative(encoding) === "utf8"
      ? new TextEncoder().encode(text)
      : Uint8Array.from(Buffer.from(text, "latin1"));
  }
  return Uint8Array.from(iconv.encode(text, encoding));
}

/** Decode bytes into a string using an encoding */
export function decodeText(data: Uint8Array, encoding: string): string {
  if (nativeEncodings.has(encoding)) {
    return new TextDecoder(normalizeNative(encoding)).decode(data);
  }
  return iconv.decode(Buffer.from(data), encoding);
}

// Decoder that keeps a character split across chunks until it is complete
interface StreamDecoder {
  write: (data: Uint8Array) => string;
  end: () => string;
}

function createStreamDecoder(encoding: string): StreamDecoder {
  if (nativeEncodings.has(encoding)) {
    const decoder = new TextDecoder(normalizeNative(encoding));
    return {
      write: (data) => decoder.decode(data, { stream: true }),
      end: () => decoder.decode(),
    };
  }
  let decoder = iconv.getDecoder(encoding);
  return {
    write: (data) => decoder.write(Buffer.from(data)),
    end: () => {
      const rest = decoder.end() ?? "";
      decoder = iconv.getDecoder(encoding);
      return rest;
    },
  };
}

// Number of bytes at the end of `data` that start a UTF-8 sequence
// without finishing it
function incompleteUtf8Tail(data: Uint8Array): number {
  for (let back = 1; back <= Math.min(3, data.length); back++) {
    const byte = data[data.length - back];
    if ((byte & 0xc0) === 0x80) {
      continue;
    }
    const needed = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    return needed > back ? back : 0;
  }
  return 0;
}

const EMPTY = new Uint8Array(0);

export interface TextCodec {
  encode: (text: string) => Uint8Array;
  // Bytes of a character split across calls are held until the next call
  decode: (data: Uint8Array) => string;
  // Flushes whatever decode() is still holding
  end: () => string;
  // "auto" until decoded data picks utf8 or latin1
  encoding: () => string;
}

/*
  A per-session codec. With "auto", decoded data is checked as strict UTF-8
  until the first non-ASCII character settles it: a complete valid sequence
  picks utf8, an invalid one picks latin1, and that choice holds for
  everything after. A sequence cut off at the end of a chunk waits for the
  next chunk before deciding. Encoding before that point uses latin1, which
  maps every code unit below 256 to a single byte.
*/
export function createTextCodec(initial: string = "auto"): TextCodec {
  let encoding = initial.toLowerCase();
  let decoder: StreamDecoder | null =
    encoding === "auto" ? null : createStreamDecoder(encoding);
  // Undecided bytes while still in auto mode
  let pending: Uint8Array = EMPTY;

  const settle = (chosen: "utf8" | "latin1"): StreamDecoder => {
    encoding = chosen;
    const settled = createStreamDecoder(chosen);
    decoder = settled;
    return settled;
  };

  const decode = (data: Uint8Array): string => {
    if (decoder) {
      return decoder.write(data);
    }
    const bytes = pending.length > 0 ? concat(pending, data) : data;
    const complete = bytes.length - incompleteUtf8Tail(bytes);
    pending = EMPTY;

    let text: string;
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(
        bytes.subarray(0, complete),
      );
    } catch {
      return settle("latin1").write(bytes);
    }

    if (bytes.subarray(0, complete).some((byte) => byte >= 0x80)) {
      return text + settle("utf8").write(bytes.subarray(complete));
    }
    pending = bytes.slice(complete);
    return text;
  };

  const end = (): string => {
    if (decoder) {
      return decoder.end();
    }
    // A sequence that never completed is not UTF-8
    const rest = pending;
    pending = EMPTY;
    return rest.length > 0 ? settle("latin1").write(rest) : "";
  };

  const encode = (text: string): Uint8Array =>
    encodeText(text, encoding === "auto" ? "latin1" : encoding);

  return { encode, decode, end, encoding: () => encoding };
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a);
  out.set(b, a.length);
  return out;
}
