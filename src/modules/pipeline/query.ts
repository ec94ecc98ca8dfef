export const MIN_QUERY_LENGTH = 3;
export const MAX_QUERY_LENGTH = 1000;

export type QueryValidation =
  | { valid: true; normalized: string }
  | { valid: false; problem: "too_short" | "too_long" };

export const normalizeQuery = (raw: string): string => raw.trim().toLowerCase();

export const validateQuery = (raw: string): QueryValidation => {
  const normalized = normalizeQuery(raw);
  if (normalized.length < MIN_QUERY_LENGTH) {
    return { valid: false, problem: "too_short" };
  }
  if (normalized.length > MAX_QUERY_LENGTH) {
    return { valid: false, problem: "too_long" };
  }
  return { valid: true, normalized };
};
