import { useRef, useSyncExternalStore } from 'react';

import type { DisplayNode } from '../domain';
import { rowsStore } from './rowsStore';
import type { RowsStore, RowsStoreState } from './rowsStore';

/**
 * Wrapper around useSyncExternalStore that ensures the snapshot is referentially
 * stable for a given store state instance.
 *
 * This matters if callers use selectors that allocate new objects/arrays; React
 * expects getSnapshot() to return a cached value if the underlying store state
 * has not changed.
 */
export function useRowsStore<T>(selector: (state: RowsStoreState) => T, store: RowsStore = rowsStore): T {
  const lastStateRef = useRef<RowsStoreState | null>(null);
  const lastSelectionRef = useRef<{ value: T } | null>(null);

  const getSnapshot = (): T => {
    const state = store.getState();

    if (lastStateRef.current === state && lastSelectionRef.current) {
      return lastSelectionRef.current.value;
    }

    const next = selector(state);
    lastStateRef.current = state;
    lastSelectionRef.current = { value: next };
    return next;
  };

  return useSyncExternalStore(
    (listener) => store.subscribe(listener),
    getSnapshot,
    getSnapshot
  );
}

/**
 * The store's display list. `getDisplayList` caches per model and drop-zone
 * flag, so it serves as the snapshot directly and follows flag changes.
 */
export function useDisplayList(store: RowsStore = rowsStore, includeDropZones?: boolean): DisplayNode[] {
  const getSnapshot = (): DisplayNode[] => store.getDisplayList(includeDropZones);
  return useSyncExternalStore((listener) => store.subscribe(listener), getSnapshot, getSnapshot);
}
