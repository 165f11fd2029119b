import { tokenize } from "../utils";

const DAY_MS = 86_400_000;

const UNCERTAINTY_MARKERS = [
  "i think",
  "maybe",
  "probably",
  "might",
  "could be",
  "possibly",
  "i'm not sure",
  "uncertain",
  "unclear",
  "don't know"
];

export function searchTerms(text: string): string[] {
  return tokenize(text.replace(/[^\p{L}\p{N}\s'-]/gu, " "));
}

/** Share of the query's terms (three letters or more) that appear in `text`. */
export function termOverlap(query: string, text: string): number {
  const terms = Array.from(new Set(searchTerms(query).filter((term) => term.length > 2)));
  if (terms.length === 0) {
    return 0;
  }
  const haystack = new Set(searchTerms(text));
  return terms.filter((term) => haystack.has(term)).length / terms.length;
}

export function freshness(updatedAt: string | undefined, now: Date, halfLifeDays = 180): number {
  if (!updatedAt) {
    return 0;
  }
  const timestamp = Date.parse(updatedAt);
  if (Number.isNaN(timestamp)) {
    return 0;
  }
  const days = Math.max(0, now.getTime() - timestamp) / DAY_MS;
  return Math.exp(-days / halfLifeDays);
}

export function isWithinDays(updatedAt: string | undefined, now: Date, days: number): boolean {
  if (!updatedAt) {
    return false;
  }
  const timestamp = Date.parse(updatedAt);
  return !Number.isNaN(timestamp) && now.getTime() - timestamp <= days * DAY_MS;
}

// 0 markers -> 1.0, 1 -> 0.8, 2 -> 0.6, more -> 0.4
export function certaintyFactor(answer: string): number {
  const lower = answer.toLowerCase();
  const markers = UNCERTAINTY_MARKERS.filter((marker) => lower.includes(marker)).length;
  if (markers === 0) return 1;
  if (markers === 1) return 0.8;
  if (markers === 2) return 0.6;
  return 0.4;
}
