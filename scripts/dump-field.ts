/* eslint-disable no-console */
/**
 * Prints a sample field for eyeballing index layout and arithmetic.
 *
 * Usage: npx tsx scripts/dump-field.ts [width] [height]
 *
 * Fills a width x height field with a radial falloff (1 at the center,
 * 0 at the corners), quantizes it to tenths, and writes the rendering to
 * stdout. Size and checksum go to stderr.
 */

import { Field, CONTINUE } from "../src";

function parseDimension(arg: string | undefined, fallback: number): number {
  if (arg === undefined) return fallback;
  const n = Number(arg);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`Expected a positive integer, got "${arg}"`);
  return n;
}

function radialFalloff(width: number, height: number): Field {
  const field = Field.sized(width, height);
  const cx = (width - 1) / 2;
  const cy = (height - 1) / 2;
  const maxDist = Math.hypot(cx, cy) || 1;

  field.forEachAll((f, x, y) => {
    f.set(x, y, 1 - Math.hypot(x - cx, y - cy) / maxDist);
    return CONTINUE;
  });

  // Round to tenths so the dump stays readable
  field.multiply(10);
  for (let i = 0; i < field.length; i++) field.setAt(i, Math.round(field.getAt(i)));
  return field.divide(10);
}

function main() {
  const width = parseDimension(process.argv[2], 8);
  const height = parseDimension(process.argv[3], 4);

  const field = radialFalloff(width, height);
  console.error(`Field ${field.width}x${field.height} (${field.length} cells), hash ${field.hashCode()}`);
  process.stdout.write(field.toString());
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
/* eslint-enable no-console */
