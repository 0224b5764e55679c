export { PrettyAxiosLogger, attachPrettyLogger } from "./interceptor";
export { FilterArgs } from "./filter-args";
export { Colors, getTextColor, paint } from "./colors";
export { loadConfig } from "./config";
export {
  StructuredPrinter,
  formatValue,
  chunkText,
  DEFAULT_FORMAT_OPTIONS,
} from "./printer/printer";
export { BoxWriter } from "./printer/box";
export { toValue, render } from "./printer/value";
export { getLogLevel, resetLogger, setLogLevel } from "./utils/logger";

export type {
  PrintableValue,
  MappingValue,
  SequenceValue,
  BinaryValue,
  ScalarValue,
} from "./printer/value";
export type { Lines } from "./printer/printer";
export type {
  PrettyAxiosLoggerInit,
  ResolvedLoggerConfig,
  FormatOptions,
  LineSink,
  RequestFilter,
  ColorName,
  LogLevel,
} from "./types";
