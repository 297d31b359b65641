import { CollaboratorError, SessionAbortedError, WorkflowError, errorMessage } from '../errors.js';
import { redact } from '../security/redaction.js';

export interface InvokeOptions {
  label: string;
  sessionId: string;
  timeoutMs: number;
  /** Aborted when the session is aborted. */
  signal: AbortSignal;
}

/**
 * Runs one collaborator call bounded by `timeoutMs`. The call receives its own
 * signal, aborted on timeout or when the session is aborted; a call that
 * ignores the signal keeps running but its result is dropped.
 */
export function invokeCollaborator<T>(
  options: InvokeOptions,
  call: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const { label, sessionId, timeoutMs, signal } = options;
  if (signal.aborted) {
    return Promise.reject(new SessionAbortedError(sessionId));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal.removeEventListener('abort', onParentAbort);
      fn();
    };

    const onParentAbort = () => {
      controller.abort();
      finish(() => reject(new SessionAbortedError(sessionId)));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new CollaboratorError(`${label} timed out after ${timeoutMs}ms`, { sessionId })));
    }, timeoutMs);

    signal.addEventListener('abort', onParentAbort, { once: true });

    call(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (err: unknown) =>
        finish(() => {
          if (err instanceof WorkflowError) {
            reject(err);
            return;
          }
          reject(new CollaboratorError(`${label} failed: ${redact(errorMessage(err))}`, { sessionId, cause: err }));
        }),
    );
  });
}
