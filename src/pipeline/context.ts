import { AsyncLocalStorage } from 'node:async_hooks';
import { performance } from 'node:perf_hooks';
import { uuidv7 } from 'uuidv7';
import { errorMessage, SessionCancelledError } from '../errors.js';

export interface StepResult {
  name: string;
  durationMs: number;
  status: 'success' | 'error' | 'cancelled';
  error?: string;
}

export interface SessionState {
  sessionId: string;
  steps: StepResult[];
  verbose: boolean;
  quiet: boolean;
  signal?: AbortSignal;
  startTime: number;
}

export interface SessionOptions {
  verbose?: boolean;
  /** Suppress step and summary lines (tests) */
  quiet?: boolean;
  signal?: AbortSignal;
}

const storage = new AsyncLocalStorage<SessionState>();

export function generateSessionId(): string {
  return uuidv7();
}

export function withSession<T>(
  options: SessionOptions,
  fn: (state: SessionState) => Promise<T>
): Promise<T> {
  const state: SessionState = {
    sessionId: generateSessionId(),
    steps: [],
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
    signal: options.signal,
    startTime: performance.now(),
  };

  if (!state.quiet) {
    console.log(`\n🔍 Session: [${state.sessionId}]`);
  }

  return storage.run(state, async () => {
    try {
      return await fn(state);
    } finally {
      printSummary(state);
    }
  });
}

/**
 * Runs one pipeline stage. The abort signal is checked here, before the
 * stage starts, and never inside it.
 */
export async function step<T>(name: string, fn: () => Promise<T>): Promise<T> {
  const state = storage.getStore();
  if (!state) return fn();

  if (state.signal?.aborted) {
    state.steps.push({ name, durationMs: 0, status: 'cancelled' });
    throw new SessionCancelledError(name);
  }

  const start = performance.now();
  if (state.verbose && !state.quiet) {
    console.log(`  ▶ ${name}`);
  }

  try {
    const result = await fn();
    const durationMs = performance.now() - start;
    state.steps.push({ name, durationMs, status: 'success' });

    if (!state.quiet) {
      console.log(
        `  ✅ ${name.padEnd(30, '.')} ${(durationMs / 1000).toFixed(1)}s`
      );
    }
    return result;
  } catch (error) {
    const durationMs = performance.now() - start;
    const message = errorMessage(error);
    state.steps.push({ name, durationMs, status: 'error', error: message });

    if (!state.quiet) {
      console.error(
        `  ❌ ${name} failed after ${(durationMs / 1000).toFixed(1)}s: ${message}`
      );
    }
    throw error;
  }
}

export function log(
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string
): void {
  const state = storage.getStore();
  if (!state) {
    if (level === 'debug' && process.env.LASSO_VERBOSE !== 'true') return;
    if (level === 'error') console.error(message);
    else if (level === 'warn') console.warn(message);
    else console.log(message);
    return;
  }

  if (state.quiet) return;
  if (level === 'debug' && !state.verbose) return;

  const prefix = level === 'info' ? '    ' : `    [${level}] `;
  if (level === 'error') console.error(`${prefix}${message}`);
  else console.log(`${prefix}${message}`);
}

function printSummary(state: SessionState): void {
  if (state.quiet) return;
  const totalDuration = (performance.now() - state.startTime) / 1000;
  console.log('─'.repeat(50));
  console.log(`🏁 Session finished in ${totalDuration.toFixed(1)}s`);
  console.log('─'.repeat(50));
}
