/**
 * Capture Tool Chain
 *
 * Tries screenshot tools in priority order until one writes a non-empty,
 * decodable image. Order: desktop-shell (D-Bus) tools, desktop-specific
 * tools, generic compositor tools, legacy X11 tools.
 */

import { stat } from 'node:fs/promises';
import path from 'node:path';
import {
  CAPTURE_TOOL_KINDS,
  type CaptureAttempt,
  type CaptureOutcome,
  type CaptureToolSpec,
  type CommandRunner,
  type EnvironmentProfile,
  type ImageCodec,
  type RawImage,
} from '../0_types.js';
import { errorMessage } from '../errors.js';
import { log } from '../pipeline/context.js';

export const OUTPUT_PLACEHOLDER = '{output}';

export const CAPTURE_TOOLS: readonly CaptureToolSpec[] = [
  {
    id: 'gnome-screenshot',
    kind: 'portal',
    command: 'gnome-screenshot',
    args: ['-f', OUTPUT_PLACEHOLDER],
    displayServer: 'any',
    desktops: ['gnome', 'unity', 'budgie', 'pantheon', 'cinnamon'],
    packages: { apt: 'gnome-screenshot', pacman: 'gnome-screenshot' },
  },
  {
    id: 'spectacle',
    kind: 'portal',
    command: 'spectacle',
    args: ['-b', '-n', '-f', '-o', OUTPUT_PLACEHOLDER],
    displayServer: 'any',
    desktops: ['kde'],
    packages: { apt: 'kde-spectacle', pacman: 'spectacle' },
  },
  {
    id: 'xfce4-screenshooter',
    kind: 'desktop',
    command: 'xfce4-screenshooter',
    args: ['-f', '-s', OUTPUT_PLACEHOLDER],
    displayServer: 'x11',
    desktops: ['xfce'],
    packages: { apt: 'xfce4-screenshooter', pacman: 'xfce4-screenshooter' },
  },
  {
    id: 'flameshot',
    kind: 'desktop',
    command: 'flameshot',
    args: ['full', '-p', OUTPUT_PLACEHOLDER],
    displayServer: 'any',
    packages: { apt: 'flameshot', pacman: 'flameshot' },
  },
  {
    id: 'grim',
    kind: 'compositor',
    command: 'grim',
    args: [OUTPUT_PLACEHOLDER],
    displayServer: 'wayland',
    packages: { apt: 'grim', pacman: 'grim' },
  },
  {
    id: 'maim',
    kind: 'x11',
    command: 'maim',
    args: [OUTPUT_PLACEHOLDER],
    displayServer: 'x11',
    packages: { apt: 'maim', pacman: 'maim' },
  },
  {
    id: 'scrot',
    kind: 'x11',
    command: 'scrot',
    args: ['-o', '-q', '100', OUTPUT_PLACEHOLDER],
    displayServer: 'x11',
    packages: { apt: 'scrot', pacman: 'scrot' },
  },
  {
    id: 'imagemagick-import',
    kind: 'x11',
    command: 'import',
    args: ['-window', 'root', OUTPUT_PLACEHOLDER],
    displayServer: 'x11',
    packages: { apt: 'imagemagick', pacman: 'imagemagick' },
  },
];

/**
 * Tools usable in this environment, highest priority first. Tools limited
 * to certain desktops are kept when the compositor is unknown.
 */
export function selectCaptureTools(
  profile: EnvironmentProfile,
  catalogue: readonly CaptureToolSpec[] = CAPTURE_TOOLS
): CaptureToolSpec[] {
  const rank = (tool: CaptureToolSpec) => CAPTURE_TOOL_KINDS.indexOf(tool.kind);

  return catalogue
    .filter(
      (tool) =>
        tool.displayServer === 'any' ||
        tool.displayServer === profile.displayServer
    )
    .filter(
      (tool) =>
        !tool.desktops ||
        profile.compositorHint === '' ||
        tool.desktops.includes(profile.compositorHint)
    )
    .map((tool, index) => ({ tool, index }))
    .sort((a, b) => rank(a.tool) - rank(b.tool) || a.index - b.index)
    .map(({ tool }) => tool);
}

export function toolArgs(tool: CaptureToolSpec, outputPath: string): string[] {
  return tool.args.map((arg) => (arg === OUTPUT_PLACEHOLDER ? outputPath : arg));
}

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch {
    return 0;
  }
}

export interface CaptureOptions {
  runner: CommandRunner;
  codec: ImageCodec;
  /** Session temp directory; one file per attempted tool is written here */
  outputDir: string;
  timeoutMs: number;
  catalogue?: readonly CaptureToolSpec[];
}

interface ToolRun {
  attempt: CaptureAttempt;
  image: RawImage | null;
}

/** One attempt with one tool; never throws. */
export async function runCaptureTool(
  tool: CaptureToolSpec,
  options: Omit<CaptureOptions, 'catalogue'>
): Promise<ToolRun> {
  const outputPath = path.join(options.outputDir, `capture-${tool.id}.png`);
  const result = await options.runner.run(tool.command, toolArgs(tool, outputPath), {
    timeoutMs: tool.timeoutMs ?? options.timeoutMs,
  });

  if (!result.ok) {
    log('debug', `${tool.id}: ${result.reason} (${result.detail})`);
    return {
      attempt: { toolId: tool.id, ok: false, reason: result.reason, detail: result.detail },
      image: null,
    };
  }

  if ((await fileSize(outputPath)) === 0) {
    log('debug', `${tool.id}: exited cleanly but wrote no image`);
    return { attempt: { toolId: tool.id, ok: false, reason: 'empty-output' }, image: null };
  }

  try {
    const decoded = await options.codec.decodeFile(outputPath);
    return {
      attempt: { toolId: tool.id, ok: true },
      image: { ...decoded, sourcePath: outputPath, provenance: tool.id },
    };
  } catch (error) {
    log('debug', `${tool.id}: output not decodable: ${errorMessage(error)}`);
    return {
      attempt: {
        toolId: tool.id,
        ok: false,
        reason: 'undecodable',
        detail: errorMessage(error),
      },
      image: null,
    };
  }
}

export async function captureScreen(
  profile: EnvironmentProfile,
  options: CaptureOptions
): Promise<CaptureOutcome> {
  const attempts: CaptureAttempt[] = [];

  for (const tool of selectCaptureTools(profile, options.catalogue)) {
    const { attempt, image } = await runCaptureTool(tool, options);
    attempts.push(attempt);
    if (image) {
      log('info', `Screenshot captured with ${tool.id} (${image.width}x${image.height})`);
      return { ok: true, image, attempts };
    }
  }

  return { ok: false, code: 'CAPTURE_FAILED', attempts };
}
