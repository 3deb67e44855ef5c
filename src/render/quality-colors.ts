/**
 * Phred quality to color buckets
 *
 * Scores run from red (unreliable calls) through yellow to green. Every
 * score of 41 or more shares the top bucket, so modern instruments that
 * emit Q42+ do not push the scale past its last color.
 */

import { ASCII_BOUNDARIES, PHRED33_OFFSET } from "../formats/fastq/constants";

/**
 * One color band of the quality scale
 */
export interface QualityBucket {
  /** Lowest Phred score in the band */
  readonly minScore: number;
  /** Highest Phred score in the band */
  readonly maxScore: number;
  /** ANSI-256 color code */
  readonly color: number;
  /** Score range as shown in the legend */
  readonly label: string;
}

/** Score from which every quality collapses into the top bucket */
export const MAX_BUCKET_SCORE = 41;

/**
 * Ordered quality buckets, lowest scores first
 */
export const QUALITY_BUCKETS: readonly QualityBucket[] = [
  { minScore: 0, maxScore: 4, color: 196, label: "0-4" },
  { minScore: 5, maxScore: 9, color: 202, label: "5-9" },
  { minScore: 10, maxScore: 14, color: 208, label: "10-14" },
  { minScore: 15, maxScore: 19, color: 220, label: "15-19" },
  { minScore: 20, maxScore: 24, color: 190, label: "20-24" },
  { minScore: 25, maxScore: 29, color: 148, label: "25-29" },
  { minScore: 30, maxScore: 34, color: 82, label: "30-34" },
  { minScore: 35, maxScore: 40, color: 46, label: "35-40" },
  { minScore: MAX_BUCKET_SCORE, maxScore: 93, color: 48, label: "41+" },
];

/**
 * Phred+33 score of a quality character
 */
export function phredScore(char: string): number {
  return char.charCodeAt(0) - PHRED33_OFFSET;
}

/**
 * Bucket index for a score
 *
 * Scores are clamped to `[0, MAX_BUCKET_SCORE]` first, so characters below
 * '!' land in the lowest bucket and anything from Q41 up in the highest.
 */
export function bucketIndexForScore(score: number): number {
  const clamped = Math.min(Math.max(score, 0), MAX_BUCKET_SCORE);
  return QUALITY_BUCKETS.findIndex((bucket) => clamped <= bucket.maxScore);
}

function buildQualityColorTable(): ReadonlyMap<string, number> {
  const table = new Map<string, number>();
  for (let code = ASCII_BOUNDARIES.PHRED33_MIN; code <= ASCII_BOUNDARIES.PHRED33_MAX; code++) {
    table.set(String.fromCharCode(code), bucketIndexForScore(code - PHRED33_OFFSET));
  }
  return table;
}

/**
 * Bucket index for every quality character from '!' (Q0) to '~' (Q93)
 */
export const QUALITY_COLOR_TABLE: ReadonlyMap<string, number> = buildQualityColorTable();

/**
 * Bucket for a quality character
 *
 * Characters outside '!'..'~' are not in the table and are bucketed by
 * their clamped score.
 */
export function qualityBucketForChar(char: string): QualityBucket {
  const index = QUALITY_COLOR_TABLE.get(char) ?? bucketIndexForScore(phredScore(char));
  return QUALITY_BUCKETS[index];
}
