/**
 * Tests for dial scene composition.
 */

import { describe, it, expect } from "vitest";
import { composeScene, describeDial, renderDial } from "../../src/lib/dial-scene";
import { createDial } from "../../src/lib/dial-scale";
import { resolveTheme } from "../../src/lib/theme";
import type {
  HandElement,
  LabelElement,
  SceneElement,
  TickElement,
} from "../../src/types/dial";

const SIZE = { width: 300, height: 300 };
const LIGHT = resolveTheme("light");
const DARK = resolveTheme("dark");

function findTick(elements: readonly SceneElement[], kind: TickElement["kind"], value: number): TickElement {
  const tick = elements.find(
    (e): e is TickElement => (e.kind === "majorTick" || e.kind === "minorTick") && e.kind === kind && e.value === value,
  );
  if (!tick) throw new Error(`no ${kind} at ${value}`);
  return tick;
}

function findLabel(elements: readonly SceneElement[], value: number): LabelElement {
  const label = elements.find((e): e is LabelElement => e.kind === "label" && e.value === value);
  if (!label) throw new Error(`no label at ${value}`);
  return label;
}

function findHand(elements: readonly SceneElement[]): HandElement {
  const hand = elements.find((e): e is HandElement => e.kind === "hand");
  if (!hand) throw new Error("no hand");
  return hand;
}

describe("composeScene", () => {
  const dial = createDial({ maxValue: 60, majorStep: 10 });

  it("emits elements in paint order", () => {
    const kinds = composeScene(dial, 30, LIGHT, { size: SIZE }).map((e) => e.kind);

    const expected: SceneElement["kind"][] = ["background", "border"];
    for (let i = 0; i < 18; i += 1) expected.push("minorTick");
    for (let i = 0; i < 7; i += 1) expected.push("majorTick", "label");
    expected.push("hand");

    expect(kinds).toEqual(expected);
  });

  it("fills the face with the theme background and outlines it with the border color", () => {
    const [background, border] = composeScene(dial, 30, LIGHT, { size: SIZE });
    expect(background).toEqual({
      kind: "background",
      center: { x: 150, y: 150 },
      radius: 150,
      fill: "#ffffff",
    });
    expect(border).toEqual({
      kind: "border",
      center: { x: 150, y: 150 },
      radius: 150,
      stroke: "#000000",
    });
  });

  it("insets a major tick from the rim by half its length", () => {
    const tick = findTick(composeScene(dial, 30, LIGHT, { size: SIZE }), "majorTick", 0);
    const inset = 150 - 9;

    expect(tick.angle).toBe(-225);
    expect(tick.length).toBeCloseTo(18, 10);
    expect(tick.thickness).toBeCloseTo(3.6, 10);
    expect(tick.center.x).toBeCloseTo(150 - inset * Math.SQRT1_2, 10);
    expect(tick.center.y).toBeCloseTo(150 + inset * Math.SQRT1_2, 10);
    expect(tick.fill).toBe("#000000");
  });

  it("sizes minor ticks smaller than major ticks", () => {
    const tick = findTick(composeScene(dial, 30, LIGHT, { size: SIZE }), "minorTick", 2.5);

    expect(tick.length).toBeCloseTo(12, 10);
    expect(tick.thickness).toBeCloseTo(2.1, 10);
    expect(tick.angle).toBeCloseTo(-213.75, 10);
  });

  it("places labels at three quarters of the radius", () => {
    const label = findLabel(composeScene(dial, 0, LIGHT, { size: SIZE }), 30);

    expect(label.text).toBe("30");
    expect(label.angle).toBe(-90);
    expect(label.position.x).toBeCloseTo(150, 10);
    expect(label.position.y).toBeCloseTo(37.5, 10);
    expect(label.fontSize).toBeCloseTo(300 / 14, 10);
    expect(label.fill).toBe("#000000");
  });

  it("points the hand at the current value with a short tail behind the pivot", () => {
    const hand = findHand(composeScene(dial, 30, LIGHT, { size: SIZE }));

    expect(hand.angle).toBe(-90);
    expect(hand.pivot).toEqual({ x: 150, y: 150 });
    expect(hand.length).toBeCloseTo(135, 10);
    expect(hand.thickness).toBeCloseTo(3, 10);
    expect(hand.pivotPosition).toBe(0.1);
    expect(hand.tip.x).toBeCloseTo(150, 10);
    expect(hand.tip.y).toBeCloseTo(28.5, 10);
    expect(hand.tail.x).toBeCloseTo(150, 10);
    expect(hand.tail.y).toBeCloseTo(163.5, 10);
    expect(hand.knobRadius).toBeCloseTo(9, 10);
    expect(hand.fill).toBe("#ef4444");
  });

  it("uses the accent color and animated angle for the hand only", () => {
    const elements = composeScene(dial, 30, LIGHT, {
      size: SIZE,
      accentColor: "#3b82f6",
      handAngle: -100,
    });

    const hand = findHand(elements);
    expect(hand.angle).toBe(-100);
    expect(hand.fill).toBe("#3b82f6");
    expect(findLabel(elements, 30).angle).toBe(-90);
  });

  it("renders values outside the range past the end of the scale", () => {
    expect(findHand(composeScene(dial, 90, LIGHT, { size: SIZE })).angle).toBe(180);
    expect(findHand(composeScene(dial, -30, LIGHT, { size: SIZE })).angle).toBe(-360);
  });

  it("applies the dark theme", () => {
    const elements = composeScene(dial, 30, DARK, { size: SIZE });
    const [background, border] = elements;

    expect(background).toMatchObject({ kind: "background", fill: "#000000" });
    expect(border).toMatchObject({ kind: "border", stroke: "transparent" });
    expect(findLabel(elements, 60).fill).toBe("#ffffff");
    expect(findTick(elements, "majorTick", 60).fill).toBe("#ffffff");
  });

  it("fits the face to the smaller side of a non-square area", () => {
    const [background] = composeScene(dial, 30, LIGHT, { size: { width: 400, height: 300 } });
    expect(background).toMatchObject({ center: { x: 200, y: 150 }, radius: 150 });
  });

  it("returns equal scenes for equal inputs", () => {
    expect(composeScene(dial, 17, LIGHT, { size: SIZE })).toEqual(
      composeScene(dial, 17, LIGHT, { size: SIZE }),
    );
  });
});

describe("renderDial", () => {
  it("pairs the scene with the accessibility summary", () => {
    const dial = createDial({ maxValue: 40, majorStep: 5, subdivisions: 5 });
    const scene = renderDial(dial, 12.5, DARK, { size: SIZE });

    expect(scene.elements.filter((e) => e.kind === "minorTick")).toHaveLength(32);
    expect(scene.elements.filter((e) => e.kind === "label")).toHaveLength(9);
    expect(scene.accessibility).toEqual({
      label: "Dial",
      value: "12.5",
      updatesFrequently: true,
    });
  });
});

describe("describeDial", () => {
  it("reports the raw value", () => {
    expect(describeDial(42).value).toBe("42");
  });
});
