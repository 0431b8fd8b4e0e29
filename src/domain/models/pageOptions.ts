/**
 * Pagination request for listing operations.
 *
 * Drivers translate these fields into their own query parameters.
 */
export interface PageOptions {
  /** 1-based page number */
  page?: number;

  /** Items per page; clamped to the backend's maximum */
  size?: number;

  /** Opaque continuation token for cursor-paginated backends */
  cursor?: string;
}
