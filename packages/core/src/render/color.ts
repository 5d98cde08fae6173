import { ValidationError } from '../errors/index.js';

export type RGB = [number, number, number];

const HEX_COLOR = /^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

/**
 * Normalise a `#RRGGBB` or `#RGB` colour to integer components.
 * The same triple feeds both the PDF drawing calls and the preview CSS.
 */
export function parseHexColor(value: string, field = 'color'): RGB {
  const match = HEX_COLOR.exec(value.trim());
  const digits = match?.[1];
  if (!digits) {
    throw new ValidationError(`Invalid ${field} "${value}"`, [`${field}: must be a #RRGGBB hex colour`]);
  }

  const full =
    digits.length === 3
      ? digits
          .split('')
          .map((d) => d + d)
          .join('')
      : digits;

  return [
    parseInt(full.slice(0, 2), 16),
    parseInt(full.slice(2, 4), 16),
    parseInt(full.slice(4, 6), 16),
  ];
}

/** CSS custom properties, e.g. `--primary-r: 107;`. */
export function cssColorVariables(name: string, [r, g, b]: RGB): string {
  return `--${name}-r: ${r}; --${name}-g: ${g}; --${name}-b: ${b};`;
}
