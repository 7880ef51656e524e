/**
 * Hand-written module for examples/shapes.request.json. The derived module
 * (examples/generated/Shapes.derived.ts) imports it as `Shapes`.
 */

import * as fc from "fast-check";

export type Point = { x: number; y: number };

export type Shape =
  | { tag: "Dot"; args: [Point] }
  | { tag: "Circle"; args: [Point, number] }
  | { tag: "Group"; args: [Shape[]] };

export const Dot = (center: Point): Shape => ({ tag: "Dot", args: [center] });
export const Circle = (center: Point, radius: number): Shape => ({ tag: "Circle", args: [center, radius] });
export const Group = (shapes: Shape[]): Shape => ({ tag: "Group", args: [shapes] });

export type Label = [string, number | undefined];

export const arbLabel: fc.Arbitrary<Label> = fc.tuple(
  fc.string({ maxLength: 12 }),
  fc.option(fc.nat(), { nil: undefined })
);
