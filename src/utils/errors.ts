// utils/errors
// Error taxonomy shared by the sync engine, the factory and the cascade.

import type { NodeId } from '../host/hostTree';

export type ViewSyncErrorCode = 'TemplateNotFound' | 'HostMutationFailure' | 'CascadeAborted';

export class ViewSyncError extends Error {
  constructor(readonly code: ViewSyncErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class TemplateNotFoundError extends ViewSyncError {
  constructor(readonly kind: string) {
    super('TemplateNotFound', `No template registered for kind "${kind}"`);
  }
}

export class HostMutationError extends ViewSyncError {
  constructor(readonly operation: string, readonly target: NodeId | undefined, readonly hostError: unknown) {
    super('HostMutationFailure', `${operation}${target ? ` (${target})` : ''} failed: ${describeError(hostError)}`);
  }
}

export class CascadeAbortedError extends ViewSyncError {
  constructor(readonly kind: string, readonly origin: ViewSyncError) {
    super('CascadeAborted', `Cascade for "${kind}" aborted: ${origin.message}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toViewSyncError(error: unknown, operation: string, target?: NodeId): ViewSyncError {
  return error instanceof ViewSyncError ? error : new HostMutationError(operation, target, error);
}

// Runs one host call and converts anything it throws into a HostMutationError.
export function guardHost<T>(operation: string, target: NodeId | undefined, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toViewSyncError(error, operation, target);
  }
}
