import { Request, Response, NextFunction } from "express";
import { PaginationWindow } from "../models/types";
import { parsePaginationQuery } from "../utils/pagination";

/** Reusable `?skip=&limit=` parsing; the window lands in res.locals.pagination. */
export const paginationParams = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  try {
    res.locals.pagination = parsePaginationQuery(req.query);
    next();
  } catch (error) {
    next(error);
  }
};

const isWindow = (value: unknown): value is PaginationWindow =>
  typeof value === "object" &&
  value !== null &&
  "skip" in value &&
  "limit" in value &&
  typeof value.skip === "number" &&
  typeof value.limit === "number";

export const currentPagination = (res: Response): PaginationWindow => {
  const window: unknown = res.locals.pagination;
  return isWindow(window) ? window : parsePaginationQuery({});
};
