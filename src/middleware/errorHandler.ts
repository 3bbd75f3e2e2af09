import { Request, Response, NextFunction } from "express";
import { HttpError } from "../utils/errors";

export const notFound = (req: Request, res: Response) => {
  res.status(404).json({ error: "Route not found" });
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // express tells error handlers apart by arity
  _next: NextFunction,
) => {
  if (err instanceof HttpError) {
    return res.status(err.status).json({ error: err.message });
  }

  // body-parser marks malformed JSON with a 4xx status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return res.status(400).json({ error: "Malformed JSON body" });
  }

  console.error(`Unhandled Error [${req.method} ${req.path}]:`, err);
  res.status(500).json({ error: "Internal Server Error" });
};
