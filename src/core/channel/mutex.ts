// src/core/channel/mutex.ts
// Per-link mutual exclusion for request/response exchanges

import type { LinkPort } from "../../ports/link";

/**
 * MutexState: Internal state of a mutex.
 */
export type MutexState = {
  /** Mutex ID */
  id: string;
  /** Name */
  name?: string;
  /** Request holding the lock (if any) */
  holder?: string;
  /** Requests waiting for the lock, in arrival order */
  waitQueue: Array<{ requestId: string; wake: () => void }>;
  /** Acquisition count */
  acquisitionCount: number;
};

/**
 * MutexEvent: Record of a lock operation.
 */
export type MutexEvent =
  | { tag: "mutexLock"; requestId: string; mutexId: string; timestamp: number }
  | { tag: "mutexUnlock"; requestId: string; mutexId: string; timestamp: number }
  | { tag: "mutexBlock"; requestId: string; mutexId: string; timestamp: number };

// ─────────────────────────────────────────────────────────────────
// Mutex registry
// ─────────────────────────────────────────────────────────────────

const linkMutexes = new WeakMap<LinkPort, MutexState>();
let nextMutexId = 0;

/**
 * Generate a unique mutex ID.
 */
function genMutexId(): string {
  return `mutex-${nextMutexId++}`;
}

/**
 * Reset mutex id generation (for testing).
 */
export function resetMutexIds(): void {
  nextMutexId = 0;
}

/**
 * Create a new mutex.
 */
export function createMutex(name?: string): MutexState {
  return {
    id: genMutexId(),
    name,
    holder: undefined,
    waitQueue: [],
    acquisitionCount: 0,
  };
}

/**
 * The mutex guarding a link, created on first use.
 */
export function mutexForLink(link: LinkPort): MutexState {
  let mutex = linkMutexes.get(link);
  if (!mutex) {
    mutex = createMutex(link.id);
    linkMutexes.set(link, mutex);
  }
  return mutex;
}

// ─────────────────────────────────────────────────────────────────
// Mutex operations
// ─────────────────────────────────────────────────────────────────

/**
 * Acquire a mutex, waiting behind earlier requests if it is held.
 */
export function acquireMutex(
  mutex: MutexState,
  requestId: string,
  onEvent?: (event: MutexEvent) => void
): Promise<void> {
  if (tryAcquireMutex(mutex, requestId, onEvent)) return Promise.resolve();

  onEvent?.({
    tag: "mutexBlock",
    requestId,
    mutexId: mutex.id,
    timestamp: Date.now(),
  });
  // Ownership is handed over in releaseMutex before wake() runs
  return new Promise<void>((resolve) => {
    mutex.waitQueue.push({ requestId, wake: () => resolve() });
  });
}

/**
 * Try to acquire a mutex without waiting.
 * Returns true if acquired, false otherwise.
 */
export function tryAcquireMutex(
  mutex: MutexState,
  requestId: string,
  onEvent?: (event: MutexEvent) => void
): boolean {
  if (mutex.holder !== undefined) return false;

  mutex.holder = requestId;
  mutex.acquisitionCount++;
  onEvent?.({
    tag: "mutexLock",
    requestId,
    mutexId: mutex.id,
    timestamp: Date.now(),
  });
  return true;
}

/**
 * Release a mutex.
 * Returns the request that now holds it, if any.
 */
export function releaseMutex(
  mutex: MutexState,
  requestId: string,
  onEvent?: (event: MutexEvent) => void
): string | undefined {
  if (mutex.holder !== requestId) {
    // Not held by this request
    return undefined;
  }

  onEvent?.({
    tag: "mutexUnlock",
    requestId,
    mutexId: mutex.id,
    timestamp: Date.now(),
  });

  const next = mutex.waitQueue.shift();
  if (next) {
    mutex.holder = next.requestId;
    mutex.acquisitionCount++;
    onEvent?.({
      tag: "mutexLock",
      requestId: next.requestId,
      mutexId: mutex.id,
      timestamp: Date.now(),
    });
    next.wake();
    return next.requestId;
  }

  // No waiters, release the mutex
  mutex.holder = undefined;
  return undefined;
}

/**
 * Run `fn` while holding the mutex. The mutex is released on every exit
 * path, including a thrown error.
 */
export async function withMutex<T>(
  mutex: MutexState,
  requestId: string,
  fn: () => Promise<T>,
  onEvent?: (event: MutexEvent) => void
): Promise<T> {
  await acquireMutex(mutex, requestId, onEvent);
  try {
    return await fn();
  } finally {
    releaseMutex(mutex, requestId, onEvent);
  }
}
