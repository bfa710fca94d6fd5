/** Error details carried by a failed response, either in the envelope or in a non-2xx body. */
export interface ApiErrorBody {
  /** HTTP status of the response the error came from. */
  status: number;
  /** Business-level error code, when the API sent one. */
  code?: number;
  message?: string;
}

/** Paging metadata of an envelope, camel-cased from the wire's `has_more`, `page_number`, ... */
export interface PageInfo {
  hasMore?: boolean;
  pageNumber?: number;
  pageSize?: number;
  /**
   * Sent as an unsigned 64-bit integer but read as a JS number: counts above
   * `Number.MAX_SAFE_INTEGER` (2^53 - 1) lose precision.
   */
  totalCount?: number;
}

/**
 * Uniform wrapper around every endpoint's payload.
 *
 * Wire `null` and a missing key both come through as an absent field.
 */
export interface ResponseEnvelope<T> {
  data?: T;
  error?: ApiErrorBody;
  pagination?: PageInfo;
}
