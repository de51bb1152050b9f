/**
 * Hook resolving the host's light/dark preference for the dial.
 */

import { useEffect, useState } from "react";
import type { ColorScheme } from "../types/dial";
import { parseColorScheme } from "../lib/theme";
import { COLOR_SCHEME_OVERRIDE } from "../constants/dial";

const DARK_QUERY = "(prefers-color-scheme: dark)";

function readAmbientScheme(): ColorScheme {
  if (COLOR_SCHEME_OVERRIDE) return parseColorScheme(COLOR_SCHEME_OVERRIDE);
  if (typeof window === "undefined" || typeof window.matchMedia !== "function") return "light";
  return window.matchMedia(DARK_QUERY).matches ? "dark" : "light";
}

/**
 * Current color scheme.
 *
 * An explicit `override` wins, then VITE_COLOR_SCHEME, then the
 * `prefers-color-scheme` media query, which is tracked live.
 */
export function useColorScheme(override?: ColorScheme): ColorScheme {
  const [ambient, setAmbient] = useState<ColorScheme>(readAmbientScheme);

  useEffect(() => {
    if (COLOR_SCHEME_OVERRIDE || typeof window.matchMedia !== "function") return;
    const query = window.matchMedia(DARK_QUERY);
    const onChange = (event: MediaQueryListEvent): void => {
      setAmbient(event.matches ? "dark" : "light");
    };
    query.addEventListener("change", onChange);
    return () => query.removeEventListener("change", onChange);
  }, []);

  return override ?? ambient;
}
