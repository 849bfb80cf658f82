/**
 * ResponseEnvelope — the fixed JSON wrapper returned by every tool.
 *
 * Success:   { success: true, data, message?, pagination? }
 * Failure:   { success: false, error }
 */

/**
 * Pagination metadata for list results. `limit` and `offset` are the
 * effective values after defaults and clamping.
 */
export interface Pagination {
  total: number;
  limit: number;
  offset: number;
}

export interface SuccessEnvelope<T = unknown> {
  success: true;
  data: T;
  message?: string;
  pagination?: Pagination;
}

export interface ErrorEnvelope {
  success: false;
  error: string;
}

export type ToolEnvelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

/**
 * Wrap a single result, with an optional confirmation message.
 */
export function successEnvelope<T>(data: T, message?: string): SuccessEnvelope<T> {
  return message !== undefined ? { success: true, data, message } : { success: true, data };
}

/**
 * Wrap one page of a list result.
 */
export function pageEnvelope<T>(data: T[], pagination: Pagination): SuccessEnvelope<T[]> {
  return { success: true, data, pagination };
}

export function errorEnvelope(error: string): ErrorEnvelope {
  return { success: false, error };
}

export function isErrorEnvelope(envelope: ToolEnvelope): envelope is ErrorEnvelope {
  return !envelope.success;
}
