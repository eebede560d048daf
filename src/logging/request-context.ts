import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContextStore {
  correlationId: string;
  clientId?: string;
  ipAddress?: string;
}

const storage = new AsyncLocalStorage<RequestContextStore>();

/**
 * Per-request values that follow the async call chain, so log lines can be
 * correlated without threading the request object through every call.
 */
export class RequestContext {
  static run<T>(store: RequestContextStore, callback: () => T): T {
    return storage.run(store, callback);
  }

  static current(): RequestContextStore | undefined {
    return storage.getStore();
  }

  static set<K extends keyof RequestContextStore>(
    key: K,
    value: RequestContextStore[K],
  ): void {
    const store = storage.getStore();
    if (store) {
      store[key] = value;
    }
  }
}
