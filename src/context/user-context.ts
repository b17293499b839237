import { AsyncLocalStorage } from "node:async_hooks";

/**
 * The authenticated user for the current request. Every stored record is
 * scoped to this id; it is also the athlete id in coaching data.
 */
const userStore = new AsyncLocalStorage<{ userId: number }>();

export function getUserId(): number {
  const store = userStore.getStore();
  if (!store) {
    throw new Error("getUserId() called outside of auth context");
  }
  return store.userId;
}

/** Like getUserId() but for log lines, where a missing context isn't an error. */
export function tryGetUserId(): number | null {
  return userStore.getStore()?.userId ?? null;
}

export function runWithUser<T>(userId: number, fn: () => T): T {
  return userStore.run({ userId }, fn);
}
