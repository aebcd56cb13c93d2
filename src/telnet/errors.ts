export type TelnetErrorCode =
  | "INVALID_OPTION"
  | "INVALID_COMMAND"
  | "CONNECTION_CLOSED"
  | "CONNECT_TIMEOUT";

// Thrown for caller mistakes and for reads past the end of a connection.
// Malformed peer input is reported as a "violation" event instead.
export class TelnetError extends Error {
  code: TelnetErrorCode;
  constructor(message: string, code: TelnetErrorCode) {
    super(message);
    this.name = "TelnetError";
    this.code = code;
  }
}
