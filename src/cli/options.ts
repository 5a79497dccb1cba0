import { InvalidArgumentError } from "commander";

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}

export function parseQuality(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed > 100) {
    throw new InvalidArgumentError("Expected a quality between 0 and 100.");
  }
  return parsed;
}

export function parseExtensionList(value: string): string[] {
  return value
    .split(",")
    .map((ext) => ext.trim().replace(/^\./, ""))
    .filter(Boolean);
}
