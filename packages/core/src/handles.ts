export interface Closable {
  close(): Promise<void>;
}

/**
 * Close every handle, even when an earlier one fails. Resolves with the first
 * close failure, or undefined when all closed cleanly.
 */
export async function closeAll(handles: ReadonlyArray<Closable | undefined>): Promise<{ cause: unknown } | undefined> {
  const results = await Promise.allSettled(handles.map((handle) => handle?.close()));
  const rejected = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  return rejected ? { cause: rejected.reason } : undefined;
}
