/**
 * Dial type definitions.
 *
 * Describes the dial's configuration, its derived tick set and
 * the scene elements the composer hands to a renderer.
 */

/** Angle in degrees. 0° points east; positive angles turn clockwise. */
export type Degrees = number;

/** Point in 2D space (y grows downward). */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Polar coordinate relative to some center. */
export interface PolarPoint {
  readonly radius: number;
  readonly angle: Degrees;
}

/** Drawing area available to a dial. */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/** Validated, immutable dial configuration. */
export interface DialConfiguration {
  /** Lowest value on the scale */
  readonly minValue: number;
  /** Highest value on the scale */
  readonly maxValue: number;
  /** Distance between labeled ticks */
  readonly majorStep: number;
  /** Parts each major interval is divided into */
  readonly subdivisions: number;
  /** Angle of `minValue` */
  readonly startAngle: Degrees;
  /** Angle of `maxValue` */
  readonly endAngle: Degrees;
}

/** Values at which tick marks are drawn. */
export interface TickSet {
  readonly majorTicks: readonly number[];
  readonly minorTicks: readonly number[];
}

/** A configuration together with its precomputed ticks. */
export interface Dial {
  readonly config: DialConfiguration;
  readonly ticks: TickSet;
}

/** Light/dark display mode. */
export type ColorScheme = "light" | "dark";

/** Colors used for the dial face. */
export interface Theme {
  readonly background: string;
  /** Ring stroke; "transparent" draws nothing */
  readonly border: string;
  readonly text: string;
  readonly tick: string;
}

/** Filled disc behind everything else. */
export interface BackgroundElement {
  readonly kind: "background";
  readonly center: Point;
  readonly radius: number;
  readonly fill: string;
}

/** Outline of the face. */
export interface BorderElement {
  readonly kind: "border";
  readonly center: Point;
  readonly radius: number;
  readonly stroke: string;
}

/** Rectangular graduation mark, centered on `center` and rotated by `angle`. */
export interface TickElement {
  readonly kind: "majorTick" | "minorTick";
  readonly value: number;
  readonly angle: Degrees;
  readonly center: Point;
  /** Radial extent */
  readonly length: number;
  readonly thickness: number;
  readonly fill: string;
}

/** Numeric label of a major tick. */
export interface LabelElement {
  readonly kind: "label";
  readonly value: number;
  readonly text: string;
  readonly angle: Degrees;
  readonly position: Point;
  readonly fontSize: number;
  readonly fill: string;
}

/** The pointer and its pivot knob. */
export interface HandElement {
  readonly kind: "hand";
  readonly angle: Degrees;
  readonly pivot: Point;
  readonly length: number;
  readonly thickness: number;
  /** Fraction of `length` behind the pivot */
  readonly pivotPosition: number;
  readonly tip: Point;
  readonly tail: Point;
  readonly knobRadius: number;
  readonly fill: string;
}

/** Anything the composer can emit, in paint order. */
export type SceneElement =
  | BackgroundElement
  | BorderElement
  | TickElement
  | LabelElement
  | HandElement;

/** Label/value pair exposed to assistive technology. */
export interface DialAccessibility {
  readonly label: string;
  readonly value: string;
  readonly updatesFrequently: boolean;
}

/** Result of rendering a dial for one frame. */
export interface DialScene {
  readonly elements: readonly SceneElement[];
  readonly accessibility: DialAccessibility;
}

/** Continuation of the hand's spring animation between frames. */
export interface SpringState {
  readonly angle: Degrees;
  /** Degrees per second */
  readonly velocity: number;
}

/** Output of a single spring step. */
export interface SpringStep {
  readonly angle: Degrees;
  readonly state: SpringState;
  readonly isSettled: boolean;
}
