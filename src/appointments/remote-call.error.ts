/** Failure talking to the doctor module: unconfigured, unreachable, timed out or non-2xx. */
export class RemoteCallError extends Error {
  constructor(message: string, readonly status?: number, readonly remoteMessage?: string) {
    super(message);
    this.name = 'RemoteCallError';
  }
}
