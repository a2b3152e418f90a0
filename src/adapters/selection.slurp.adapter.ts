/**
 * Interactive rectangle selection
 *
 * Used when no path or pointer events are supplied. slurp (Wayland) and
 * slop (X11) both print the selection as `x,y wxh`; a non-zero exit means
 * the user dismissed the selection.
 */

import type {
  BoundingBox,
  CommandRunner,
  DisplayServer,
  PackageNames,
  RegionSelector,
} from '../0_types.js';
import { boundingBoxOf, isDegeneratePath, rectanglePath } from '../domain/region.js';
import { log } from '../pipeline/context.js';

interface SelectorTool {
  command: string;
  args: string[];
  packages: PackageNames;
}

export const SELECTOR_TOOLS: Record<DisplayServer, SelectorTool> = {
  wayland: {
    command: 'slurp',
    args: ['-f', '%x,%y %wx%h'],
    packages: { apt: 'slurp', pacman: 'slurp' },
  },
  x11: {
    command: 'slop',
    args: ['-f', '%x,%y %wx%h'],
    packages: { apt: 'slop', pacman: 'slop' },
  },
};

export function parseGeometry(output: string): BoundingBox | null {
  const match = output.trim().match(/^(-?\d+),(-?\d+)\s+(\d+)x(\d+)$/);
  if (!match) return null;
  const [, x, y, width, height] = match.map(Number);
  return { x, y, width, height };
}

export function createSlurpRegionSelector(
  runner: CommandRunner,
  timeoutMs: number
): RegionSelector {
  return {
    select: async (profile) => {
      const tool = SELECTOR_TOOLS[profile.displayServer];
      const result = await runner.run(tool.command, tool.args, { timeoutMs });

      if (!result.ok) {
        if (result.reason === 'missing') {
          log('warn', `${tool.command} is not installed; pass --path or --events instead`);
        }
        return { status: 'cancelled', reason: 'dismissed' };
      }

      const box = parseGeometry(result.stdout);
      if (!box || box.width < 1 || box.height < 1) {
        return { status: 'cancelled', reason: 'dismissed' };
      }

      const path = rectanglePath(box);
      if (isDegeneratePath(path)) {
        return { status: 'cancelled', reason: 'degenerate' };
      }
      return { status: 'selected', path, bounds: boundingBoxOf(path) };
    },
  };
}
