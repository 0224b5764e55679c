import { isBinary, isMappingLike, isSequenceLike } from "./printer/value";

/**
 * What a user filter sees about the event being logged.
 *
 * @example
 * ```typescript
 * new PrettyAxiosLogger({
 *   filter: (config, args) => !args.isResponse || args.hasJsonData,
 * });
 * ```
 */
export class FilterArgs {
  /**
   * @param isResponse - false for the request hook, true for response and
   * error hooks
   * @param data - request payload, or the response payload when
   * `isResponse` is true
   */
  constructor(
    readonly isResponse: boolean,
    readonly data: unknown
  ) {}

  get hasStringData(): boolean {
    return typeof this.data === "string";
  }

  get hasMapData(): boolean {
    return isMappingLike(this.data);
  }

  get hasListData(): boolean {
    return isSequenceLike(this.data);
  }

  get hasBinaryData(): boolean {
    return isBinary(this.data);
  }

  get hasJsonData(): boolean {
    return this.hasMapData || this.hasListData;
  }
}
