import type { ColorName } from "./types";

/** ANSI SGR foreground codes, plus `reset` for the terminal default. */
export const Colors = {
  red: "\u001b[31m",
  black: "\u001b[30m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  blue: "\u001b[34m",
  magenta: "\u001b[35m",
  cyan: "\u001b[36m",
  white: "\u001b[37m",
  reset: "\u001b[0m",
} as const satisfies Record<ColorName, string>;

export function getTextColor(color: ColorName): string {
  return Colors[color];
}

/** Wraps a line in `color`; `reset` leaves it untouched. */
export function paint(line: string, color: ColorName): string {
  if (color === "reset") return line;
  return `${Colors[color]}${line}${Colors.reset}`;
}
