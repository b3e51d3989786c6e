/**
 * Signal handling
 *
 * SIGINT/SIGTERM close the MCP server (and the HTTP listener, if any)
 * before the process exits. A second signal while closing is ignored.
 */

import { errorMessage } from './errors.js';
import { log } from './logger.js';

export type ShutdownHandler = (signal: NodeJS.Signals) => Promise<void>;

export function createShutdownHandler(
  close: () => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code)
): ShutdownHandler {
  let closing = false;

  return async (signal) => {
    if (closing) return;
    closing = true;
    log.info(`Received ${signal}, shutting down`);

    try {
      await close();
      exit(0);
    } catch (error) {
      log.error('Shutdown failed', { signal, error: errorMessage(error) });
      exit(1);
    }
  };
}
