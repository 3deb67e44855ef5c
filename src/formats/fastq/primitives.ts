/**
 * FASTQ parsing primitives
 *
 * Small pure functions shared by the record reader and the header
 * colorizer.
 */

import { ERROR_PREVIEW_LENGTH, LINE_MARKERS } from "./constants";

/**
 * Check if a line opens a FASTQ record
 */
export function isHeaderLine(line: string): boolean {
  return line.startsWith(LINE_MARKERS.HEADER);
}

/**
 * Check if a line is a FASTQ separator
 */
export function isSeparatorLine(line: string): boolean {
  return line.startsWith(LINE_MARKERS.SEPARATOR);
}

/**
 * Check that a quality line has one character per base
 */
export function lengthsMatch(sequence: string, quality: string): boolean {
  return sequence.length === quality.length;
}

/**
 * Whether a line carries nothing but whitespace
 */
export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Shorten a line for quoting in an error message
 */
export function previewLine(line: string): string {
  return line.length > ERROR_PREVIEW_LENGTH
    ? `${JSON.stringify(line.slice(0, ERROR_PREVIEW_LENGTH))}...`
    : JSON.stringify(line);
}

/**
 * Header line split into the pieces the colorizer styles separately
 */
export interface HeaderFields {
  /** Leading marker character, '@' or '+' */
  readonly marker: string;
  /** Colon-separated fields of the read identifier */
  readonly idFields: readonly string[];
  /** Colon-separated fields of the description, empty when there is none */
  readonly descriptionFields: readonly string[];
}

/**
 * Split a header (or separator) line into identifier and description fields
 *
 * The identifier ends at the first space; both parts are split on ':' so
 * that Illumina-style headers (`@M00123:45:000-ABC:1:1101 1:N:0:7`) expose
 * each instrument field.
 *
 * @example
 * ```typescript
 * splitHeaderFields("@r1:7 1:N");
 * // { marker: "@", idFields: ["r1", "7"], descriptionFields: ["1", "N"] }
 * ```
 */
export function splitHeaderFields(line: string): HeaderFields {
  const marker = line.slice(0, 1);
  const content = line.slice(1);
  const space = content.indexOf(" ");
  const id = space === -1 ? content : content.slice(0, space);
  const description = space === -1 ? "" : content.slice(space + 1);

  return {
    marker,
    idFields: id.split(":"),
    descriptionFields: description === "" ? [] : description.split(":"),
  };
}
