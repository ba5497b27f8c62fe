/**
 * Ctrl-C handling for a running batch: the first interrupt lets the items in
 * progress finish, the second one quits at once.
 */

export const INTERRUPT_EXIT_CODE = 130;

export interface InterruptHooks {
  /** Called on the first interrupt */
  onStop: () => void;
  /** Called on every later interrupt */
  onForce: () => void;
}

export interface InterruptHandler {
  handle: () => void;
  stopRequested: () => boolean;
}

export function createInterruptHandler(hooks: InterruptHooks): InterruptHandler {
  let stopRequested = false;
  return {
    handle: () => {
      if (stopRequested) {
        hooks.onForce();
        return;
      }
      stopRequested = true;
      hooks.onStop();
    },
    stopRequested: () => stopRequested,
  };
}
