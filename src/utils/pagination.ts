import { z } from "zod";
import { PaginationWindow } from "../models/types";
import { ValidationError } from "./errors";
import { integerField, parseWith } from "./params";

export const DEFAULT_SKIP = 0;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

const SKIP_MIN_MESSAGE = "skip must be greater than or equal to 0";

export const paginationQuerySchema = z.object({
  skip: integerField("skip").pipe(z.number().min(0, SKIP_MIN_MESSAGE)).optional(),
  limit: integerField("limit").optional(),
});

/**
 * Applies defaults and bounds to a requested window.
 * `limit` is clamped into [1, MAX_LIMIT] without error; a negative `skip`
 * is rejected.
 */
export const normalizePagination = (
  requested: Partial<PaginationWindow> = {},
): PaginationWindow => {
  const skip = requested.skip ?? DEFAULT_SKIP;
  const limit = requested.limit ?? DEFAULT_LIMIT;

  if (skip < 0) throw new ValidationError(SKIP_MIN_MESSAGE);

  return { skip, limit: Math.min(Math.max(limit, 1), MAX_LIMIT) };
};

export const parsePaginationQuery = (query: unknown): PaginationWindow =>
  normalizePagination(parseWith(paginationQuerySchema, query));

export const paginate = <T>(items: readonly T[], window: PaginationWindow): T[] =>
  items.slice(window.skip, window.skip + window.limit);
