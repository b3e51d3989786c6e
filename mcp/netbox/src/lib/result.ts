/**
 * Tool result envelope
 *
 * Every tool answers with exactly one of these. Callers check `success`
 * before reading `data`; the union makes that check mandatory in TypeScript.
 */

import { errorMessage } from './errors.js';
import { log } from './logger.js';

export type ToolSuccess<T, Extras extends object = Record<never, never>> = {
  success: true;
  data: T;
} & Extras;

export interface ToolFailure {
  success: false;
  error: string;
  message?: string;
}

export type ToolResult<T = unknown, Extras extends object = Record<never, never>> =
  | ToolSuccess<T, Extras>
  | ToolFailure;

export function ok<T>(data: T): ToolSuccess<T>;
export function ok<T, Extras extends object>(data: T, extras: Extras): ToolSuccess<T, Extras>;
export function ok<T, Extras extends object>(
  data: T,
  extras?: Extras
): ToolSuccess<T> | ToolSuccess<T, Extras> {
  return { success: true as const, ...extras, data };
}

export function fail(error: unknown, message?: string): ToolFailure {
  const failure: ToolFailure = { success: false, error: errorMessage(error) };
  if (message) {
    failure.message = message;
  }
  return failure;
}

/**
 * Run a tool operation and turn anything it throws into a failure envelope.
 */
export async function guard<R extends { success: boolean }>(
  operation: () => Promise<R>,
  failureMessage?: string
): Promise<R | ToolFailure> {
  try {
    return await operation();
  } catch (error) {
    log.debug('Tool operation failed', {
      error: errorMessage(error),
      kind: error instanceof Error ? error.name : typeof error,
    });
    return fail(error, failureMessage);
  }
}
