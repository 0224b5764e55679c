/**
 * @module interceptor
 * @description Axios interceptor that prints boxed transcripts of every
 * request, response and failure. It only observes: configs and responses are
 * returned untouched and errors are always re-thrown.
 *
 * @example
 * ```typescript
 * import axios from "axios";
 * import { PrettyAxiosLogger } from "pretty-axios-logger";
 *
 * const client = axios.create({ baseURL: "https://api.example.com" });
 * new PrettyAxiosLogger({ requestBody: true, responseHeader: true }).attach(client);
 * ```
 */

import axios, {
  isAxiosError,
  type AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { paint } from "./colors";
import { loadConfig } from "./config";
import { FilterArgs } from "./filter-args";
import { BoxWriter } from "./printer/box";
import { MARGIN, StructuredPrinter, type Lines } from "./printer/printer";
import { entriesOf, isMappingLike, render, toValue } from "./printer/value";
import type {
  ColorName,
  PrettyAxiosLoggerInit,
  ResolvedLoggerConfig,
} from "./types";
import { log, setLogLevel } from "./utils/logger";

type Row = readonly [string, unknown];

export class PrettyAxiosLogger {
  readonly config: ResolvedLoggerConfig;
  private readonly printer: StructuredPrinter;
  private readonly box: BoxWriter;
  /** Request start times, keyed by the config object axios threads through */
  private readonly startedAt = new WeakMap<InternalAxiosRequestConfig, number>();

  constructor(init: PrettyAxiosLoggerInit = {}) {
    this.config = loadConfig(init);
    if (this.config.logLevel !== undefined) setLogLevel(this.config.logLevel);
    this.printer = new StructuredPrinter({
      maxWidth: this.config.maxWidth,
      compact: this.config.compact,
    });
    this.box = new BoxWriter(this.printer);
  }

  /**
   * Registers the hooks on `instance`.
   * @returns a function that ejects both interceptors again
   */
  attach(instance: AxiosInstance): () => void {
    const requestId = instance.interceptors.request.use((config) =>
      this.onRequest(config)
    );
    const responseId = instance.interceptors.response.use(
      (response) => this.onResponse(response),
      (error: unknown) => this.onError(error)
    );
    log.debug("Interceptors attached", { requestId, responseId });

    return () => {
      instance.interceptors.request.eject(requestId);
      instance.interceptors.response.eject(responseId);
    };
  }

  onRequest(config: InternalAxiosRequestConfig): InternalAxiosRequestConfig {
    this.startedAt.set(config, this.config.clock());

    if (!this.admits(config, new FilterArgs(false, config.data))) {
      return config;
    }

    const { colors } = this.config;
    this.guard("request", () => {
      const method = methodOf(config);

      if (this.config.request) {
        this.emit(
          colors.request,
          this.box.boxed(`Request ║ ${method} `, axios.getUri(config))
        );
      }
      if (this.config.requestHeader) {
        this.emit(colors.header, this.requestHeaderLines(config));
      }
      if (this.config.requestBody && method !== "GET") {
        this.emit(colors.body, this.requestBodyLines(config.data));
      }
    });

    return config;
  }

  onResponse(response: AxiosResponse): AxiosResponse {
    if (!this.admits(response.config, new FilterArgs(true, response.data))) {
      return response;
    }

    const { colors } = this.config;
    this.guard("response", () => {
      const elapsed = this.elapsed(response.config);
      const method = methodOf(response.config);

      this.emit(
        colors.responseStatus,
        this.box.boxed(
          `Response ║ ${method} ║ Status: ${response.status} ${response.statusText}  ║ Time: ${elapsed} ms`,
          axios.getUri(response.config)
        )
      );
      if (this.config.responseHeader) {
        this.emit(
          colors.responseHeader,
          this.box.table(headerRows(response.headers), "Headers")
        );
      }
      if (this.config.responseBody) {
        this.emit(colors.response, this.bodyLines(response.data));
      }
    });

    return response;
  }

  /** Prints the failure, then re-throws it unchanged. */
  onError(error: unknown): never {
    if (
      isAxiosError(error) &&
      this.config.error &&
      this.admits(error.config, new FilterArgs(true, error.response?.data))
    ) {
      const failure = error;
      this.guard("error", () => this.printFailure(failure));
    }

    throw error;
  }

  private printFailure(error: AxiosError): void {
    const { response } = error;

    if (response) {
      const elapsed = this.elapsed(error.config);
      this.emit(
        this.config.colors.error,
        this.badResponseLines(
          `AxiosError ║ Status: ${response.status} ${response.statusText} ║ Time: ${elapsed} ms`,
          axios.getUri(response.config),
          error.code,
          response.data
        )
      );
    } else {
      this.emit(
        this.config.colors.error,
        this.box.boxed(`AxiosError ║ ${error.code ?? error.name}`, error.message)
      );
    }
  }

  private admits(
    config: InternalAxiosRequestConfig | undefined,
    args: FilterArgs
  ): boolean {
    if (!this.config.enabled) return false;
    const { filter } = this.config;
    if (!filter || !config) return true;

    try {
      return filter(config, args);
    } catch (error) {
      log.warn("Filter threw; skipping transcript", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private elapsed(config: InternalAxiosRequestConfig | undefined): number {
    const start = config ? this.startedAt.get(config) : undefined;
    return start === undefined ? 0 : this.config.clock() - start;
  }

  private emit(color: ColorName, lines: Iterable<string>): void {
    for (const line of lines) {
      this.config.logPrint(paint(line, color));
    }
  }

  /** A transcript failure must never reach the request flow. */
  private guard(phase: string, print: () => void): void {
    try {
      print();
    } catch (error) {
      log.warn(`Failed to print ${phase} transcript`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private *requestHeaderLines(config: InternalAxiosRequestConfig): Lines {
    yield* this.box.table(paramRows(config.params), "Query Parameters");

    const rows: Row[] = headerRows(config.headers);
    if (config.responseType !== undefined) {
      rows.push(["responseType", config.responseType]);
    }
    if (config.maxRedirects !== undefined) {
      rows.push(["maxRedirects", config.maxRedirects]);
    }
    if (config.timeout) rows.push(["timeout", config.timeout]);
    yield* this.box.table(rows, "Headers");
  }

  private *requestBodyLines(data: unknown): Lines {
    if (data === undefined || data === null) return;

    if (data instanceof FormData) {
      yield* this.box.table(formDataRows(data), "Form data");
    } else if (data instanceof URLSearchParams) {
      yield* this.printer.printBlock(data.toString());
    } else if (isMappingLike(data)) {
      yield* this.box.table(entriesOf(data), "Body");
    } else if (typeof data === "string") {
      yield* this.printer.printBlock(data);
    } else {
      yield* this.printer.printBlock(render(toValue(data)));
    }
  }

  private *bodyLines(data: unknown): Lines {
    yield "╔ Body";
    yield MARGIN;
    yield* this.dataLines(data);
    yield MARGIN;
    yield this.box.rule("╚");
  }

  private *badResponseLines(
    header: string,
    uri: string,
    code: string | undefined,
    data: unknown
  ): Lines {
    yield* this.box.boxed(header, uri);
    if (data !== undefined && data !== null) {
      yield `╔ ${code ?? "ERR_BAD_RESPONSE"}`;
      yield* this.dataLines(data);
    }
    yield this.box.rule("╚");
    yield "";
  }

  private *dataLines(data: unknown): Lines {
    if (data === undefined || data === null) return;
    yield* this.printer.format(data);
  }
}

function methodOf(config: InternalAxiosRequestConfig): string {
  return (config.method ?? "get").toUpperCase();
}

/** Works for raw header records and `AxiosHeaders`, which keeps names as own keys. */
function headerRows(headers: object | null | undefined): Row[] {
  if (!headers) return [];
  return Object.entries(headers).filter(
    ([, value]) => value !== undefined && value !== null && value !== false
  );
}

function paramRows(params: unknown): Row[] {
  if (params instanceof URLSearchParams) return Array.from(params.entries());
  if (isMappingLike(params)) return entriesOf(params);
  return [];
}

function formDataRows(data: FormData): Row[] {
  return Array.from(data.entries(), ([key, value]): Row => [
    key,
    typeof value === "string" ? value : `<file ${value.name}>`,
  ]);
}

/** Creates a logger and attaches it to `instance` in one step. */
export function attachPrettyLogger(
  instance: AxiosInstance,
  init: PrettyAxiosLoggerInit = {}
): PrettyAxiosLogger {
  const logger = new PrettyAxiosLogger(init);
  logger.attach(instance);
  return logger;
}
