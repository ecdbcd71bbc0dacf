import { toError } from './errors.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownHookResult = {
  name: string;
  status: 'ok' | 'error';
  error?: Error;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const shutdownHooks: RegisteredHook[] = [];

/**
 * Registers a hook that runs once the watcher has stopped. Re-registering a name replaces
 * the previous hook; the returned function unregisters it.
 */
export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

/** Runs hooks in reverse registration order. A failing hook does not stop the rest. */
export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: ShutdownHookResult[] = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({ name: entry.name, status: 'error', error: toError(error) });
    }
  }
  return results;
}

export function listShutdownHooks(): string[] {
  return shutdownHooks.map(entry => entry.name);
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}
