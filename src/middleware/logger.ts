import { Request, Response, NextFunction, RequestHandler } from "express";
import { RequestLogMode } from "../config/env";

const PREVIEW_LENGTH = 200;

const maskQuery = (query: Request["query"]) =>
  "token" in query ? { ...query, token: "***" } : query;

/**
 * Verbose per-request logging: method, path, query, params, body, auth marker,
 * then status, duration and a preview of the response once it is sent.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  const query = maskQuery(req.query);

  console.log("\n" + "=".repeat(80));
  console.log("INCOMING REQUEST");
  console.log("=".repeat(80));
  console.log(`Timestamp: ${new Date().toISOString()}`);
  console.log(`Method: ${req.method}`);
  console.log(`Path: ${req.path}`);

  if (Object.keys(query).length > 0) {
    console.log("Query Params:", JSON.stringify(query, null, 2));
  }

  if (req.body && typeof req.body === "object" && Object.keys(req.body).length > 0) {
    console.log("Body:", JSON.stringify(req.body, null, 2));
  }

  console.log(`Auth: ${"token" in req.query ? "token present" : "no token"}`);
  console.log(`IP: ${req.ip || req.socket.remoteAddress}`);
  console.log("=".repeat(80));

  const originalSend = res.send;
  res.send = (body?: unknown): Response => {
    const duration = Date.now() - startTime;

    console.log("\n" + "-".repeat(80));
    console.log("RESPONSE SENT");
    console.log("-".repeat(80));
    // route params are only known once the route matched
    if (Object.keys(req.params).length > 0) {
      console.log("Route Params:", JSON.stringify(req.params, null, 2));
    }
    console.log(`Endpoint: ${req.method} ${req.path}`);
    console.log(`Duration: ${duration}ms`);
    console.log(`Status Code: ${res.statusCode}`);

    const text = typeof body === "string" ? body : JSON.stringify(body) ?? "";
    const preview = text.substring(0, PREVIEW_LENGTH);
    console.log(
      `Response Preview: ${preview}${text.length > PREVIEW_LENGTH ? "..." : ""}`,
    );
    console.log("-".repeat(80) + "\n");

    return originalSend.call(res, body);
  };

  next();
};

/** One line per request. */
export const simpleLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  res.on("finish", () => {
    console.log(
      `[${new Date().toISOString()}] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startTime}ms`,
    );
  });
  next();
};

export const loggerFor = (mode: RequestLogMode): RequestHandler | undefined => {
  switch (mode) {
    case "verbose":
      return requestLogger;
    case "simple":
      return simpleLogger;
    case "off":
      return undefined;
  }
};
