import { describe, expect, it, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '../../0_types.js';
import {
  createSlurpRegionSelector,
  parseGeometry,
} from '../../adapters/selection.slurp.adapter.js';

function runnerReturning(result: CommandResult): CommandRunner {
  return { run: vi.fn(async () => result) };
}

describe('parseGeometry', () => {
  it('parses "x,y wxh"', () => {
    expect(parseGeometry('120,45 300x80\n')).toEqual({ x: 120, y: 45, width: 300, height: 80 });
  });

  it('returns null for anything else', () => {
    expect(parseGeometry('selection cancelled')).toBeNull();
  });
});

describe('createSlurpRegionSelector', () => {
  it('turns the geometry into a rectangular path', async () => {
    const runner = runnerReturning({ ok: true, stdout: '10,20 5x4' });
    const selector = createSlurpRegionSelector(runner, 1000);

    const outcome = await selector.select({ displayServer: 'wayland', compositorHint: 'sway' });

    expect(outcome).toEqual({
      status: 'selected',
      path: [
        { x: 10, y: 20 },
        { x: 14, y: 20 },
        { x: 14, y: 23 },
        { x: 10, y: 23 },
      ],
      bounds: { x: 10, y: 20, width: 5, height: 4 },
    });
    expect(runner.run).toHaveBeenCalledWith('slurp', ['-f', '%x,%y %wx%h'], {
      timeoutMs: 1000,
    });
  });

  it('uses slop on X11', async () => {
    const runner = runnerReturning({ ok: true, stdout: '0,0 3x3' });
    await createSlurpRegionSelector(runner, 1000).select({
      displayServer: 'x11',
      compositorHint: '',
    });
    expect(runner.run).toHaveBeenCalledWith('slop', ['-f', '%x,%y %wx%h'], {
      timeoutMs: 1000,
    });
  });

  it('treats a non-zero exit as a dismissed selection', async () => {
    const runner = runnerReturning({ ok: false, reason: 'exit', detail: 'cancelled' });
    const outcome = await createSlurpRegionSelector(runner, 1000).select({
      displayServer: 'wayland',
      compositorHint: '',
    });
    expect(outcome).toEqual({ status: 'cancelled', reason: 'dismissed' });
  });

  it('treats a one-pixel-wide selection as degenerate', async () => {
    const runner = runnerReturning({ ok: true, stdout: '5,5 1x1' });
    const outcome = await createSlurpRegionSelector(runner, 1000).select({
      displayServer: 'wayland',
      compositorHint: '',
    });
    expect(outcome).toEqual({ status: 'cancelled', reason: 'degenerate' });
  });
});
