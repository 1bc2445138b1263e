export type DownFlag = {
  key: string;
  timestamp: number;
  status: 'down';
};

// `error` is kept apart from `absent` so a storage outage never reads as "healthy".
export type FlagLookup =
  | { kind: 'exists'; flag: DownFlag }
  | { kind: 'absent' }
  | { kind: 'error'; error: string };

export interface FlagStore {
  exists(key: string): Promise<FlagLookup>;
  /** No-op when the flag is already present. */
  create(key: string, timestamp: number): Promise<void>;
  /** No-op when the flag is already gone. */
  delete(key: string): Promise<void>;
}

export class FlagStoreError extends Error {
  constructor(
    public readonly operation: 'exists' | 'create' | 'delete',
    public readonly key: string,
    message: string,
  ) {
    super(`flag ${operation} failed for ${key}: ${message}`);
    this.name = 'FlagStoreError';
  }
}
