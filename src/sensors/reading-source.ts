import type { ReadingSource } from "./types.js";

/** Uniformly distributed value in [min, max). */
export function uniform(min: number, max: number, random: () => number = Math.random): number {
  return min + random() * (max - min);
}

/** A source that draws uniformly from [min, max). */
export function uniformSource(min: number, max: number, random: () => number = Math.random): ReadingSource {
  return () => uniform(min, max, random);
}

/**
 * A source that replays `values` in order and then keeps returning the last one.
 * Used to drive a simulation through a scripted scenario.
 */
export function scriptedSource(values: readonly number[]): ReadingSource {
  if (values.length === 0) {
    throw new Error("scriptedSource requires at least one value");
  }
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)];
    index++;
    return value;
  };
}
