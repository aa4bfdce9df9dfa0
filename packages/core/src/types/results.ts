/** Failure kinds a remote call can end with */
export type RemoteError =
  | { readonly kind: 'remote'; readonly status: number; readonly message: string }
  | { readonly kind: 'network'; readonly message: string }
  | { readonly kind: 'invalid-response'; readonly message: string }
  | { readonly kind: 'invalid-argument'; readonly message: string };

export type ClientResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'error'; readonly error: RemoteError };

// Helper functions
export function ok<T>(data: T): ClientResult<T> {
  return { type: 'success', data };
}

export function fail<T = never>(error: RemoteError): ClientResult<T> {
  return { type: 'error', error };
}

/** Human-readable form of a remote failure, as printed on the status line */
export function describeRemoteError(error: RemoteError): string {
  switch (error.kind) {
    case 'remote': return `todoist api error ${error.status}: ${error.message}`;
    case 'network': return `todoist request failed: ${error.message}`;
    case 'invalid-response': return `unexpected todoist response: ${error.message}`;
    case 'invalid-argument': return error.message;
  }
}
