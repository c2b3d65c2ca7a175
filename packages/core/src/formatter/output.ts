import { paint } from "@shellmark/shared";
import type { ChalkInstance } from "chalk";
import type { Segment } from "./types.js";

/**
 * Plain text of a segment list, styles dropped.
 */
export function segmentsToText(segments: readonly Segment[]): string {
  return segments.map((segment) => segment.text).join("");
}

/**
 * Paint every segment with its style and join the results.
 */
export function segmentsToAnsi(segments: readonly Segment[], instance?: ChalkInstance): string {
  return segments.map((segment) => paint(segment.text, segment.style, instance)).join("");
}
