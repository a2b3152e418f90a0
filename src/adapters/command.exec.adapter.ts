/**
 * Command Runner
 *
 * Runs external tools with execFile (no shell) under a timeout and turns
 * every failure into a CommandResult instead of an exception.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CommandResult, CommandRunner } from '../0_types.js';

const execFileAsync = promisify(execFile);

function field(error: unknown, key: 'code' | 'killed' | 'signal' | 'stderr'): unknown {
  return typeof error === 'object' && error !== null && key in error
    ? Reflect.get(error, key)
    : undefined;
}

export function classifyExecError(error: unknown): CommandResult {
  const message = error instanceof Error ? error.message : String(error);

  if (field(error, 'code') === 'ENOENT') {
    return { ok: false, reason: 'missing', detail: message };
  }
  if (field(error, 'killed') === true || field(error, 'signal') === 'SIGTERM') {
    return { ok: false, reason: 'timeout', detail: message };
  }

  const stderr = field(error, 'stderr');
  const detail =
    typeof stderr === 'string' && stderr.trim() ? stderr.trim() : message;
  return { ok: false, reason: 'exit', detail: detail.slice(0, 500) };
}

export function createExecCommandRunner(): CommandRunner {
  return {
    run: async (command, args, options) => {
      try {
        const { stdout } = await execFileAsync(command, [...args], {
          encoding: 'utf-8',
          timeout: options.timeoutMs,
          maxBuffer: 10 * 1024 * 1024,
        });
        return { ok: true, stdout };
      } catch (error) {
        return classifyExecError(error);
      }
    },
  };
}
