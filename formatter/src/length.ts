/**
 * Physical length units accepted by length literals: `12pt`, `3cm`
 */
export type Unit = "pt" | "mm" | "cm" | "in";

export const UNITS: readonly Unit[] = ["pt", "mm", "cm", "in"];

export function isUnit(value: string): value is Unit {
  return UNITS.some((unit) => unit === value);
}
