/**
 * Unit conversion and colour parsing helpers
 */

import { SlidesError } from '../errors';
import type { RgbColor } from '../model/primitives';

// ============================================================================
// Units
// ============================================================================

export type LengthUnit = 'EMU' | 'PT' | 'PX' | 'IN' | 'CM' | 'MM';

/** EMU per unit; PX assumes 96 DPI. */
export const EMU_PER_UNIT: Readonly<Record<LengthUnit, number>> = {
  EMU: 1,
  PT: 12_700,
  PX: 9_525,
  IN: 914_400,
  CM: 360_000,
  MM: 36_000,
};

function isLengthUnit(unit: string): unit is LengthUnit {
  return Object.prototype.hasOwnProperty.call(EMU_PER_UNIT, unit);
}

function toLengthUnit(unit: string): LengthUnit {
  const upper = unit.toUpperCase();
  if (isLengthUnit(upper)) return upper;
  throw new SlidesError(`Unsupported unit: ${unit}. Valid units are: ${Object.keys(EMU_PER_UNIT).join(', ')}`);
}

/** Case-insensitive; converts through EMU. */
export function convertUnit(value: number, from: string, to: string): number {
  const emu = value * EMU_PER_UNIT[toLengthUnit(from)];
  return emu / EMU_PER_UNIT[toLengthUnit(to)];
}

export function emuFromPoints(points: number): number {
  return Math.round(points * EMU_PER_UNIT.PT);
}

export function pointsFromEmu(emu: number): number {
  return emu / EMU_PER_UNIT.PT;
}

// ============================================================================
// Colours
// ============================================================================

/** 0–255 channels */
export interface RgbTriple {
  red: number;
  green: number;
  blue: number;
}

const NAMED_COLORS: Readonly<Record<string, RgbTriple>> = {
  black: { red: 0, green: 0, blue: 0 },
  white: { red: 255, green: 255, blue: 255 },
  red: { red: 255, green: 0, blue: 0 },
  green: { red: 0, green: 255, blue: 0 },
  blue: { red: 0, green: 0, blue: 255 },
  yellow: { red: 255, green: 255, blue: 0 },
  cyan: { red: 0, green: 255, blue: 255 },
  magenta: { red: 255, green: 0, blue: 255 },
  gray: { red: 128, green: 128, blue: 128 },
  grey: { red: 128, green: 128, blue: 128 },
};

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{6})$/;
const RGB_PATTERN = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/;

/**
 * Accepts `#RGB`, `#RRGGBB`, `rgb(r, g, b)` and a handful of colour names.
 *
 * @throws SlidesError for anything else, or a channel above 255
 */
export function parseColor(input: string): RgbTriple {
  const value = input.trim().toLowerCase();

  const named = NAMED_COLORS[value];
  if (named) return { ...named };

  const hex = HEX_PATTERN.exec(value)?.[1];
  if (hex !== undefined) {
    const full = hex.length === 3 ? [...hex].map((c) => c + c).join('') : hex;
    return {
      red: parseInt(full.slice(0, 2), 16),
      green: parseInt(full.slice(2, 4), 16),
      blue: parseInt(full.slice(4, 6), 16),
    };
  }

  const rgb = RGB_PATTERN.exec(value);
  if (rgb) {
    const red = Number(rgb[1]);
    const green = Number(rgb[2]);
    const blue = Number(rgb[3]);
    if (red <= 255 && green <= 255 && blue <= 255) {
      return { red, green, blue };
    }
  }

  throw new SlidesError(`Invalid color format: ${input}`);
}

/** API colour channels are 0–1 floats. */
export function colorToRgbColor(color: string | RgbTriple): RgbColor {
  const { red, green, blue } = typeof color === 'string' ? parseColor(color) : color;
  return { red: red / 255, green: green / 255, blue: blue / 255 };
}
