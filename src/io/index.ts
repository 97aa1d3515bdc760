/**
 * Console input and output.
 */

export { ConsoleTerminal, type Terminal, type ConsoleTerminalOptions } from "./terminal.ts";
export { StreamLineSource, type LineSource } from "./line-source.ts";
export {
  ValidatedReader,
  parseIntegerInput,
  parsePositiveDoubleInput,
  isAffirmative,
  type ParseResult,
} from "./validated-reader.ts";
