/**
 * Clinical review status -> confidence tier ("stars")
 */

export type ReviewStars = 0 | 1 | 2 | 3 | 4;

export const REVIEW_STATUS_STARS: Readonly<Record<string, ReviewStars>> = Object.freeze({
  'practice guideline': 4,
  'reviewed by expert panel': 3,
  'criteria provided, multiple submitters, no conflicts': 2,
  'criteria provided, conflicting classifications': 1,
  'criteria provided, single submitter': 1,
  'no assertion for the individual variant': 0,
  'no assertion criteria provided': 0,
  'no classification for the single variant': 0,
  'no classifications from unflagged records': 0,
  'no classification provided': 0,
});

/** Tier for any status the table does not list */
export const UNRECOGNIZED_REVIEW_STARS: ReviewStars = 0;

export type ReviewStatusTable = ReadonlyMap<string, ReviewStars>;

function normalizeStatus(status: string): string {
  return status.trim().toLowerCase();
}

export function createReviewStatusTable(
  entries: Readonly<Record<string, ReviewStars>> = REVIEW_STATUS_STARS
): ReviewStatusTable {
  return new Map(Object.entries(entries).map(([status, stars]) => [normalizeStatus(status), stars]));
}

export const DEFAULT_REVIEW_STATUS_TABLE: ReviewStatusTable = createReviewStatusTable();

/**
 * Case-insensitive lookup. Unrecognized or missing statuses map to 0.
 */
export function getReviewStars(
  status: string | null | undefined,
  table: ReviewStatusTable = DEFAULT_REVIEW_STATUS_TABLE
): ReviewStars {
  if (!status) {
    return UNRECOGNIZED_REVIEW_STARS;
  }
  return table.get(normalizeStatus(status)) ?? UNRECOGNIZED_REVIEW_STARS;
}

export function isReviewStars(value: number): value is ReviewStars {
  return Number.isInteger(value) && value >= 0 && value <= 4;
}
