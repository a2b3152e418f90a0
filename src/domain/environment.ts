/**
 * Environment Profile
 *
 * Display-server family and compositor identity, read from environment
 * variables only. Unknown setups are treated as X11 so the capture chain
 * always has candidates.
 */

import type { EnvironmentProfile } from '../0_types.js';

const KNOWN_DESKTOPS = [
  'hyprland',
  'sway',
  'gnome',
  'kde',
  'xfce',
  'cinnamon',
  'mate',
  'budgie',
  'pantheon',
  'unity',
  'lxqt',
  'river',
  'wayfire',
  'labwc',
  'i3',
];

const DESKTOP_ALIASES: Record<string, string> = {
  plasma: 'kde',
  plasmawayland: 'kde',
  'plasma-wayland': 'kde',
  ubuntu: 'gnome',
  'gnome-xorg': 'gnome',
  'gnome-classic': 'gnome',
  xfce4: 'xfce',
  'x-cinnamon': 'cinnamon',
};

function desktopTokens(env: NodeJS.ProcessEnv): string[] {
  return [env.XDG_CURRENT_DESKTOP, env.XDG_SESSION_DESKTOP, env.DESKTOP_SESSION]
    .filter((v): v is string => typeof v === 'string' && v.trim() !== '')
    .flatMap((v) => v.split(':'))
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean)
    .map((t) => DESKTOP_ALIASES[t] ?? t);
}

export function detectCompositor(env: NodeJS.ProcessEnv): string {
  if (env.HYPRLAND_INSTANCE_SIGNATURE) return 'hyprland';
  if (env.SWAYSOCK) return 'sway';

  const tokens = desktopTokens(env);
  const known = tokens.find((t) => KNOWN_DESKTOPS.includes(t));
  return known ?? tokens[0] ?? '';
}

export function detectEnvironment(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentProfile {
  const sessionType = env.XDG_SESSION_TYPE?.trim().toLowerCase();
  const isWayland =
    sessionType === 'wayland' ||
    (sessionType !== 'x11' && Boolean(env.WAYLAND_DISPLAY));

  return Object.freeze({
    displayServer: isWayland ? 'wayland' : 'x11',
    compositorHint: detectCompositor(env),
  });
}
