import type { CrossPosterError } from './errors.js';

/**
 * Explicit success/failure outcome returned across component boundaries
 */
export type Result<T, E extends CrossPosterError = CrossPosterError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends CrossPosterError>(error: E): { success: false; error: E } {
  return { success: false, error };
}
