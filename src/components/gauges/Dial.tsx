/**
 * Circular analog dial with a spring-animated hand.
 *
 * Renders the scene produced by renderDial as SVG: a face, minor and
 * major tick marks, integer labels and a pointer that swings to the
 * current value. Display only; the dial never writes back.
 */

import { useMemo } from "react";
import type { ColorScheme, SceneElement } from "../../types/dial";
import { createDial } from "../../lib/dial-scale";
import { renderDial } from "../../lib/dial-scene";
import { angleFor } from "../../lib/gauge-utils";
import { resolveTheme } from "../../lib/theme";
import { useColorScheme } from "../../hooks/useColorScheme";
import { useSpringAngle } from "../../hooks/useSpringAngle";
import { DIAL_DEFAULTS, DIAL_RENDER_DEFAULTS } from "../../constants/dial";

/** Props for the Dial component. */
export interface DialProps {
  /** Value the hand points at; may lie outside the scale */
  readonly currentValue: number;
  /** Lowest scale value (default: 0) */
  readonly minValue?: number;
  /** Highest scale value (default: 100) */
  readonly maxValue?: number;
  /** Distance between labeled ticks (default: 20) */
  readonly majorStep?: number;
  /** Parts each major interval is divided into (default: 4) */
  readonly subdivisions?: number;
  /** Angle of minValue in degrees, 0 = east, clockwise (default: -225) */
  readonly startAngle?: number;
  /** Angle of maxValue in degrees (default: 45) */
  readonly endAngle?: number;
  /** Hand and knob color (default: red) */
  readonly accentColor?: string;
  /** Force a color scheme instead of following the environment */
  readonly colorScheme?: ColorScheme;
  /** Edge of the SVG viewBox (default: 300) */
  readonly size?: number;
}

/** Draw a single scene element. */
function renderElement(element: SceneElement, key: string): React.ReactElement {
  switch (element.kind) {
    case "background":
      return (
        <circle
          key={key}
          data-kind="background"
          cx={element.center.x}
          cy={element.center.y}
          r={element.radius}
          fill={element.fill}
        />
      );

    case "border":
      // Inset by half the stroke so the ring is not clipped by the viewBox
      return (
        <circle
          key={key}
          data-kind="border"
          cx={element.center.x}
          cy={element.center.y}
          r={element.radius - 0.5}
          fill="none"
          stroke={element.stroke}
          strokeWidth={1}
        />
      );

    case "majorTick":
    case "minorTick": {
      const { center, length, thickness } = element;
      return (
        <rect
          key={key}
          data-kind={element.kind}
          x={center.x - length / 2}
          y={center.y - thickness / 2}
          width={length}
          height={thickness}
          fill={element.fill}
          transform={`rotate(${element.angle} ${center.x} ${center.y})`}
        />
      );
    }

    case "label":
      return (
        <text
          key={key}
          data-kind="label"
          x={element.position.x}
          y={element.position.y}
          textAnchor="middle"
          dominantBaseline="central"
          fill={element.fill}
          style={{
            fontSize: `${element.fontSize}px`,
            fontWeight: 700,
            fontVariantNumeric: "tabular-nums",
          }}
        >
          {element.text}
        </text>
      );

    case "hand": {
      const { pivot, length, thickness } = element;
      return (
        <g key={key} data-kind="hand" data-angle={element.angle}>
          <rect
            x={pivot.x - length * element.pivotPosition}
            y={pivot.y - thickness / 2}
            width={length}
            height={thickness}
            fill={element.fill}
            transform={`rotate(${element.angle} ${pivot.x} ${pivot.y})`}
          />
          <circle cx={pivot.x} cy={pivot.y} r={element.knobRadius} fill={element.fill} />
        </g>
      );
    }
  }
}

/**
 * Analog dial.
 *
 * The configuration is validated when it changes; an invalid one throws
 * InvalidConfigurationError during render instead of drawing a partial
 * dial. The hand eases toward each new value with a damped spring.
 * Exposed to assistive technology as a single "Dial" meter whose value
 * text is the current value.
 */
export function Dial({
  currentValue,
  minValue = DIAL_DEFAULTS.minValue,
  maxValue = DIAL_DEFAULTS.maxValue,
  majorStep = DIAL_DEFAULTS.majorStep,
  subdivisions = DIAL_DEFAULTS.subdivisions,
  startAngle = DIAL_DEFAULTS.startAngle,
  endAngle = DIAL_DEFAULTS.endAngle,
  accentColor = DIAL_RENDER_DEFAULTS.accentColor,
  colorScheme,
  size = DIAL_RENDER_DEFAULTS.size,
}: DialProps): React.ReactElement {
  const dial = useMemo(
    () => createDial({ minValue, maxValue, majorStep, subdivisions, startAngle, endAngle }),
    [minValue, maxValue, majorStep, subdivisions, startAngle, endAngle],
  );

  const scheme = useColorScheme(colorScheme);
  const targetAngle = angleFor(
    currentValue,
    dial.config.minValue,
    dial.config.maxValue,
    dial.config.startAngle,
    dial.config.endAngle,
  );
  const handAngle = useSpringAngle(targetAngle);

  const { elements, accessibility } = renderDial(dial, currentValue, resolveTheme(scheme), {
    size: { width: size, height: size },
    accentColor,
    handAngle,
  });

  return (
    <div className="aspect-square w-full max-w-full max-h-full">
      <svg
        viewBox={`0 0 ${size} ${size}`}
        className="w-full h-full"
        role="meter"
        aria-label={accessibility.label}
        aria-valuetext={accessibility.value}
        aria-valuenow={currentValue}
        aria-valuemin={dial.config.minValue}
        aria-valuemax={dial.config.maxValue}
        aria-live={accessibility.updatesFrequently ? "off" : "polite"}
      >
        <g aria-hidden="true">
          {elements.map((element, i) => renderElement(element, `${element.kind}-${i}`))}
        </g>
      </svg>
    </div>
  );
}
