/**
 * Dial scene composition.
 *
 * Turns a dial, the current value and a theme into the ordered list
 * of drawable elements for one frame. Later elements paint on top.
 */

import type {
  Degrees,
  Dial,
  DialAccessibility,
  DialScene,
  HandElement,
  LabelElement,
  Point,
  SceneElement,
  Size,
  Theme,
  TickElement,
} from "../types/dial";
import {
  DIAL_RENDER_DEFAULTS,
  HAND_GEOMETRY,
  LABEL_GEOMETRY,
  TICK_GEOMETRY,
} from "../constants/dial";
import { angleFor, formatTickLabel, polarToCartesian } from "./gauge-utils";

/** Per-frame rendering inputs besides the value and theme. */
export interface ComposeOptions {
  /** Drawing area; the dial is fit to the smaller side */
  readonly size: Size;
  /** Hand and knob color */
  readonly accentColor?: string;
  /** Animated hand angle; defaults to the angle of the current value */
  readonly handAngle?: Degrees;
}

/** Center and diameter of the face inside a drawing area. */
interface FaceGeometry {
  readonly center: Point;
  readonly diameter: number;
}

function faceGeometry(size: Size): FaceGeometry {
  return {
    center: { x: size.width / 2, y: size.height / 2 },
    diameter: Math.min(size.width, size.height),
  };
}

function tickElement(
  kind: TickElement["kind"],
  value: number,
  angle: Degrees,
  face: FaceGeometry,
  fill: string,
): TickElement {
  const ratios = kind === "majorTick" ? TICK_GEOMETRY.major : TICK_GEOMETRY.minor;
  const length = face.diameter * ratios.length;
  // Inset so the outer end of the mark touches the rim
  const insetRadius = face.diameter / 2 - length / 2;
  return {
    kind,
    value,
    angle,
    center: polarToCartesian(face.center.x, face.center.y, insetRadius, angle),
    length,
    thickness: face.diameter * ratios.thickness,
    fill,
  };
}

function labelElement(value: number, angle: Degrees, face: FaceGeometry, fill: string): LabelElement {
  const radius = (face.diameter / 2) * LABEL_GEOMETRY.radiusRatio;
  return {
    kind: "label",
    value,
    text: formatTickLabel(value),
    angle,
    position: polarToCartesian(face.center.x, face.center.y, radius, angle),
    fontSize: face.diameter / LABEL_GEOMETRY.fontSizeDivisor,
    fill,
  };
}

function handElement(angle: Degrees, face: FaceGeometry, fill: string): HandElement {
  const length = face.diameter * HAND_GEOMETRY.length;
  const { x, y } = face.center;
  return {
    kind: "hand",
    angle,
    pivot: face.center,
    length,
    thickness: face.diameter * HAND_GEOMETRY.thickness,
    pivotPosition: HAND_GEOMETRY.pivotPosition,
    tip: polarToCartesian(x, y, length * (1 - HAND_GEOMETRY.pivotPosition), angle),
    tail: polarToCartesian(x, y, length * HAND_GEOMETRY.pivotPosition, angle + 180),
    knobRadius: face.diameter * HAND_GEOMETRY.knobRadius,
    fill,
  };
}

/**
 * Compose the scene for one frame.
 *
 * Emits the background disc, the border ring, every minor tick, each
 * major tick followed by its label, and finally the hand. Any value is
 * accepted, including values outside the dial's range.
 */
export function composeScene(
  dial: Dial,
  currentValue: number,
  theme: Theme,
  options: ComposeOptions,
): SceneElement[] {
  const { minValue, maxValue, startAngle, endAngle } = dial.config;
  const face = faceGeometry(options.size);
  const radius = face.diameter / 2;
  const angleOf = (value: number): Degrees =>
    angleFor(value, minValue, maxValue, startAngle, endAngle);

  const elements: SceneElement[] = [
    { kind: "background", center: face.center, radius, fill: theme.background },
    { kind: "border", center: face.center, radius, stroke: theme.border },
  ];

  for (const value of dial.ticks.minorTicks) {
    elements.push(tickElement("minorTick", value, angleOf(value), face, theme.tick));
  }

  for (const value of dial.ticks.majorTicks) {
    const angle = angleOf(value);
    elements.push(tickElement("majorTick", value, angle, face, theme.tick));
    elements.push(labelElement(value, angle, face, theme.text));
  }

  elements.push(
    handElement(
      options.handAngle ?? angleOf(currentValue),
      face,
      options.accentColor ?? DIAL_RENDER_DEFAULTS.accentColor,
    ),
  );

  return elements;
}

/** Label/value pair announced for the dial. */
export function describeDial(currentValue: number): DialAccessibility {
  return {
    label: "Dial",
    value: String(currentValue),
    updatesFrequently: true,
  };
}

/**
 * Render a dial for one frame: scene elements plus accessibility summary.
 */
export function renderDial(
  dial: Dial,
  currentValue: number,
  theme: Theme,
  options: ComposeOptions,
): DialScene {
  return {
    elements: composeScene(dial, currentValue, theme, options),
    accessibility: describeDial(currentValue),
  };
}
