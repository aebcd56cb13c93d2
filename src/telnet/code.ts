export type TelnetCodeName = keyof typeof TELNET;
export type TelnetCode = (typeof TELNET)[TelnetCodeName];

export const TELNET = {
  IAC: 255,
  // Negotiation
  WILL: 251,
  WONT: 252,
  DO: 253,
  DONT: 254,
  // Subnegotiation
  SE: 240,
  SB: 250,
  // Single-byte commands (RFC 854)
  NOP: 241,
  DM: 242, // Data Mark
  BRK: 243, // Break
  IP: 244, // Interrupt Process
  AO: 245, // Abort Output
  AYT: 246, // Are You There
  EC: 247, // Erase Character
  EL: 248, // Erase Line
  GA: 249, // Go Ahead
  EOR: 239, // https://www.rfc-editor.org/rfc/rfc885.html
  // Options
  BINARY: 0,
  ECHO: 1,
  SUPPRESS_GO_AHEAD: 3,
  STATUS: 5,
  TIMING_MARK: 6,
  TERMINAL_TYPE: 24,
  TELOPT_EOR: 25,
  WINDOW_SIZE: 31, // https://www.rfc-editor.org/rfc/rfc1073.html Negotiate about window size (NAWS)
  TERMINAL_SPEED: 32,
  REMOTE_FLOW_CONTROL: 33,
  LINEMODE: 34,
  NEW_ENVIRON: 39, // https://www.rfc-editor.org/rfc/rfc1572.html
  CHARSET: 42,
} as const;

// eslint-disable-next-line no-redeclare
export type TELNET = typeof TELNET;

export type Verb = TELNET["WILL"] | TELNET["WONT"] | TELNET["DO"] | TELNET["DONT"];

export function isVerb(code: number): code is Verb {
  return (
    code === TELNET.WILL ||
    code === TELNET.WONT ||
    code === TELNET.DO ||
    code === TELNET.DONT
  );
}

// IAC <code> with no payload: EOR, SE and NOP..GA
export function isControlCode(code: number): boolean {
  return code >= TELNET.EOR && code <= TELNET.GA;
}

export function isOption(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}

// Commands and options are separate namespaces: option 251 is not "WILL"
const commandNames = new Map<number, string>();
const optionNames = new Map<number, string>();
for (const [name, code] of Object.entries(TELNET)) {
  if (code >= TELNET.EOR) {
    commandNames.set(code, name);
  } else {
    optionNames.set(code, name);
  }
}

export function getCommandName(code: number): string {
  return commandNames.get(code) ?? `unknown(${code})`;
}

export function getOptionName(option: number): string {
  return optionNames.get(option) ?? `unknown(${option})`;
}
