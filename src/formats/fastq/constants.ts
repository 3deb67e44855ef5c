/**
 * Constants for FASTQ record parsing and quality decoding
 */

// ============================================================================
// RECORD STRUCTURE
// ============================================================================

/**
 * Fixed four-line record layout
 */
export const RECORD_LAYOUT = {
  /** Lines in one record: header, sequence, separator, quality */
  LINES_PER_RECORD: 4,
  /** Position of the header line within a record */
  HEADER_LINE: 0,
  /** Position of the separator line within a record */
  SEPARATOR_LINE: 2,
} as const;

/**
 * Line markers that open the header and separator lines
 */
export const LINE_MARKERS = {
  HEADER: "@",
  SEPARATOR: "+",
} as const;

// ============================================================================
// QUALITY ENCODING
// ============================================================================

/**
 * ASCII boundaries of Phred+33 quality characters
 */
export const ASCII_BOUNDARIES = {
  /** Phred+33 minimum ASCII value (!) */
  PHRED33_MIN: 33,
  /** Phred+33 maximum ASCII value (~) */
  PHRED33_MAX: 126,
} as const;

/** Offset subtracted from a character code to get its Phred score */
export const PHRED33_OFFSET = 33;

/** Longest preview of an offending line quoted in error context */
export const ERROR_PREVIEW_LENGTH = 40;
