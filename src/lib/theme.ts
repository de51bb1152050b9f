/**
 * Color scheme resolution.
 *
 * The core only ever receives a concrete {@link Theme}; turning an
 * ambient light/dark preference into one happens here.
 */

import type { ColorScheme, Theme } from "../types/dial";
import { THEME_COLORS } from "../constants/dial";

/** Narrow an arbitrary value to a known color scheme, defaulting to light. */
export function parseColorScheme(raw: unknown): ColorScheme {
  return raw === "dark" ? "dark" : "light";
}

/**
 * Theme for a color scheme. Unrecognized schemes get the light theme.
 */
export function resolveTheme(scheme: unknown): Theme {
  return THEME_COLORS[parseColorScheme(scheme)];
}
