// ---------------------------------------------------------------------------
// Launch environment builder
// ---------------------------------------------------------------------------

/**
 * Builds the full environment for a launched game.
 *
 * The result has string values only, as `child_process.spawn` requires.
 *
 * Variable precedence (highest wins):
 *   game overlay  >  inherited environment
 *
 * The overlay never replaces the inherited environment wholesale: PATH,
 * DISPLAY, WAYLAND_DISPLAY, XDG_RUNTIME_DIR etc. must survive for wine,
 * mangohud and gamescope to start at all.
 */
export function buildLaunchEnv(
  overlay: Readonly<Record<string, string>>,
  inheritedEnv: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const inherited: Record<string, string> = {};
  for (const [key, value] of Object.entries(inheritedEnv)) {
    if (value !== undefined) inherited[key] = value;
  }

  return {
    ...inherited,
    // The game's own variables have the final say
    ...overlay,
  };
}
