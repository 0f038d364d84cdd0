// utils/updateSuppression
// Scoped redraw/message suppression around multi-step host mutations.

import type { HostTree } from '../host/hostTree';

// Restores whatever state was active before the scope, so scopes nest.
export function withSuppressedUpdates<T>(host: HostTree, fn: () => T): T {
  const previous = host.getUpdateSuppression();
  host.setUpdateSuppression({ redraw: true, messages: true });
  try {
    return fn();
  } finally {
    host.setUpdateSuppression(previous);
  }
}
