const DEBUG_FLAG_KEY = 'rowsAndFoldersDebug';

export type DebugLog = (...args: unknown[]) => void;

/** `localStorage.rowsAndFoldersDebug = '1'` turns tracing on without code changes. */
export function isDebugFlagSet(): boolean {
  try {
    return typeof window !== 'undefined' && window.localStorage?.getItem(DEBUG_FLAG_KEY) === '1';
  } catch {
    // Storage can be blocked (private mode, sandboxed frames).
    return false;
  }
}

export function createDebugLog(scope: string, enabled: boolean): DebugLog {
  const prefix = `[Rows & Folders ${scope}]`;
  return (...args: unknown[]) => {
    if (!enabled) return;
    console.log(prefix, ...args);
  };
}
