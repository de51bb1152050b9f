/**
 * Viewport size classes driving the demo's responsive layout.
 */

import { useEffect, useState } from "react";
import { SIZE_CLASS_BREAKPOINTS } from "../constants/dial";

/** Coarse width/height class of the viewport. */
export type SizeClass = "compact" | "regular";

/** Horizontal and vertical size class pair. */
export interface SizeClasses {
  readonly horizontal: SizeClass;
  readonly vertical: SizeClass;
}

/** Classify a viewport size. */
export function classifyViewport(width: number, height: number): SizeClasses {
  return {
    horizontal: width < SIZE_CLASS_BREAKPOINTS.width ? "compact" : "regular",
    vertical: height < SIZE_CLASS_BREAKPOINTS.height ? "compact" : "regular",
  };
}

/**
 * Size classes of the window, updated on resize.
 */
export function useSizeClasses(): SizeClasses {
  const [classes, setClasses] = useState<SizeClasses>(() =>
    classifyViewport(window.innerWidth, window.innerHeight),
  );

  useEffect(() => {
    const onResize = (): void => {
      const next = classifyViewport(window.innerWidth, window.innerHeight);
      setClasses((prev) =>
        prev.horizontal === next.horizontal && prev.vertical === next.vertical ? prev : next,
      );
    };
    window.addEventListener("resize", onResize);
    return () => window.removeEventListener("resize", onResize);
  }, []);

  return classes;
}
