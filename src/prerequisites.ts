/**
 * Prerequisite Checker
 *
 * Reports which capture, selection and browser tools exist for the current
 * environment and how to install the missing ones.
 */

import type {
  CaptureAttempt,
  CommandRunner,
  EnvironmentProfile,
  PackageNames,
} from './0_types.js';
import { CAPTURE_TOOLS, selectCaptureTools } from './services/capture-chain.js';
import { findChrome } from './adapters/browser.adapter.js';
import { SELECTOR_TOOLS } from './adapters/selection.slurp.adapter.js';

export type PackageManager = 'apt' | 'pacman';

export interface PrerequisiteResult {
  name: string;
  found: boolean;
  required: boolean;
  installCommand?: string;
  notes?: string;
}

const INSTALL_PREFIX: Record<PackageManager, string> = {
  apt: 'sudo apt install',
  pacman: 'sudo pacman -S',
};

export function installCommand(
  packages: PackageNames,
  manager: PackageManager | null
): string | undefined {
  if (!manager) return undefined;
  const pkg = packages[manager];
  return pkg ? `${INSTALL_PREFIX[manager]} ${pkg}` : undefined;
}

export async function detectPackageManager(
  runner: CommandRunner
): Promise<PackageManager | null> {
  for (const manager of ['pacman', 'apt'] as const) {
    const result = await runner.run(manager, ['--version'], { timeoutMs: 5000 });
    if (result.ok) return manager;
  }
  return null;
}

/** `which` exits non-zero when the command is not on PATH */
async function hasCommand(runner: CommandRunner, command: string): Promise<boolean> {
  const result = await runner.run('which', [command], { timeoutMs: 5000 });
  return result.ok;
}

export async function checkPrerequisites(
  profile: EnvironmentProfile,
  runner: CommandRunner,
  options: { chromePath?: string } = {}
): Promise<PrerequisiteResult[]> {
  const manager = await detectPackageManager(runner);
  const results: PrerequisiteResult[] = [];

  for (const tool of selectCaptureTools(profile)) {
    results.push({
      name: `${tool.id} (capture, ${tool.kind})`,
      found: await hasCommand(runner, tool.command),
      required: false,
      installCommand: installCommand(tool.packages, manager),
    });
  }

  const selector = SELECTOR_TOOLS[profile.displayServer];
  results.push({
    name: `${selector.command} (region selection)`,
    found: await hasCommand(runner, selector.command),
    required: false,
    installCommand: installCommand(selector.packages, manager),
    notes: 'Only needed without --path or --events',
  });

  results.push({
    name: 'xdg-open (open search results)',
    found: await hasCommand(runner, 'xdg-open'),
    required: true,
    installCommand: installCommand({ apt: 'xdg-utils', pacman: 'xdg-utils' }, manager),
  });

  results.push({
    name: 'Chrome/Chromium (visual search)',
    found: (await findChrome({ chromePath: options.chromePath })) !== null,
    required: false,
    installCommand: installCommand({ apt: 'chromium', pacman: 'chromium' }, manager),
    notes: 'Set LASSO_CHROME_PATH for other locations',
  });

  return results;
}

export function hasUsableCaptureTool(results: PrerequisiteResult[]): boolean {
  return results.some((r) => r.name.includes('(capture') && r.found);
}

export function printDoctorResults(
  profile: EnvironmentProfile,
  results: PrerequisiteResult[]
): void {
  console.log(
    `Environment: ${profile.displayServer}${profile.compositorHint ? ` (${profile.compositorHint})` : ''}\n`
  );

  for (const result of results) {
    const icon = result.found ? '✓' : '✗';
    console.log(`${icon} ${result.name}`);
    if (!result.found && result.installCommand) {
      console.log(`  → Install: ${result.installCommand}`);
    }
    if (result.notes) console.log(`  ${result.notes}`);
  }

  console.log('');
  const missingRequired = results.filter((r) => r.required && !r.found);
  if (!hasUsableCaptureTool(results)) {
    console.log('✗ No screenshot tool available. Install one of the tools above.');
  } else if (missingRequired.length > 0) {
    console.log(`Missing ${missingRequired.length} required prerequisite(s).`);
  } else {
    console.log('✓ Ready to capture.');
  }
}

/** Fatal message for an exhausted capture chain */
export function formatCaptureFailure(
  attempts: CaptureAttempt[],
  manager: PackageManager | null
): string {
  const lines = ['Error: No functional screenshot tool found.', 'Tried:'];

  for (const attempt of attempts) {
    const reason = attempt.ok ? 'ok' : attempt.reason;
    lines.push(`  - ${attempt.toolId}: ${reason}`);
  }
  if (attempts.length === 0) {
    lines.push('  (no tool matches this display server)');
  }

  const hints = attempts
    .filter((a) => !a.ok && a.reason === 'missing')
    .map((a) => CAPTURE_TOOLS.find((t) => t.id === a.toolId))
    .map((tool) => (tool ? installCommand(tool.packages, manager) : undefined))
    .filter((cmd): cmd is string => Boolean(cmd));

  if (hints.length > 0) {
    lines.push('Install one of them, e.g.:');
    for (const hint of hints) lines.push(`  ${hint}`);
  }
  return lines.join('\n');
}
