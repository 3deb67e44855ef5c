/**
 * ANSI-256 color codes for sequence bases and header fields
 */

/**
 * Color per nucleotide; bases missing from the table print unstyled
 */
export const NUCLEOTIDE_COLORS: Readonly<Record<string, number>> = {
  A: 46, // green
  T: 196, // red
  G: 226, // yellow
  C: 33, // blue
  N: 240, // gray
};

/**
 * Rotating palette for the colon-separated header fields
 */
export const HEADER_COLORS: readonly number[] = [
  39, // bright blue
  208, // orange
  170, // pink
  114, // light green
  220, // yellow
  147, // light purple
  87, // cyan
  203, // coral
];

/**
 * Look up the color for a base, ignoring case
 */
export function nucleotideColor(base: string): number | undefined {
  return NUCLEOTIDE_COLORS[base.toUpperCase()];
}

/**
 * Color for the header field at `index`, wrapping around the palette
 */
export function headerColor(index: number): number {
  return HEADER_COLORS[index % HEADER_COLORS.length];
}
