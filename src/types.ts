import type { InternalAxiosRequestConfig } from "axios";
import type { FilterArgs } from "./filter-args";
import type {
  FormatOptions,
  LoggerOptionsData,
} from "./schema/options";

export type { FormatOptions };

export type LogLevel = NonNullable<LoggerOptionsData["logLevel"]>;

export type ColorName = LoggerOptionsData["defaultColor"];

/** Receives each finished transcript line, top to bottom. */
export type LineSink = (line: string) => void;

export type RequestFilter = (
  config: InternalAxiosRequestConfig,
  args: FilterArgs
) => boolean;

export interface PrettyAxiosLoggerInit {
  /** Print the request box (method and URI) */
  request?: boolean;
  /** Print query parameters and request headers */
  requestHeader?: boolean;
  /** Print the request payload; never printed for GET */
  requestBody?: boolean;
  /** Print response headers */
  responseHeader?: boolean;
  /** Print the response payload */
  responseBody?: boolean;
  /** Print failed requests */
  error?: boolean;
  /** Display columns per line (default: 90) */
  maxWidth?: number;
  /** Collapse small leaf-only maps and lists onto one line (default: true) */
  compact?: boolean;
  enabled?: boolean;
  /**
   * Level of the package's own diagnostics, not of the transcript. The
   * diagnostics logger is shared by every instance, so setting this changes
   * it package-wide; leaving it unset keeps the current level (`warn`
   * unless changed).
   */
  logLevel?: LogLevel;
  /** Transcript sink; defaults to console.log */
  logPrint?: LineSink;
  filter?: RequestFilter;
  /** Millisecond clock used for the `Time:` column */
  clock?: () => number;

  defaultColor?: ColorName;
  requestColor?: ColorName;
  headerColor?: ColorName;
  bodyColor?: ColorName;
  errorColor?: ColorName;
  responseColor?: ColorName;
  responseHeaderColor?: ColorName;
  responseStatusColor?: ColorName;
}

/** Options after defaults, rc file and environment have been merged. */
export interface ResolvedLoggerConfig
  extends Omit<LoggerOptionsData, `${string}Color`> {
  logPrint: LineSink;
  filter?: RequestFilter;
  clock: () => number;
  colors: SectionColors;
}

export interface SectionColors {
  default: ColorName;
  request: ColorName;
  header: ColorName;
  body: ColorName;
  error: ColorName;
  response: ColorName;
  responseHeader: ColorName;
  responseStatus: ColorName;
}
