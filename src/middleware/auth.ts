import { Request, Response, NextFunction } from "express";
import { Account, Role } from "../models/types";
import {
  authenticate,
  authenticateAdmin,
  authenticateWith,
  Capability,
  Step,
} from "../services/AuthService";
import { AccountDirectory } from "../stores/AccountDirectory";

// ?token=alice_token
const tokenFrom = (req: Request): string | undefined => {
  const token = req.query.token;
  return typeof token === "string" ? token : undefined;
};

const guard =
  (chain: Step<string | undefined, Account>) =>
  (req: Request, res: Response, next: NextFunction) => {
    const result = chain(tokenFrom(req));
    if (!result.ok) return next(result.error);

    res.locals.account = result.value;
    next();
  };

export const requireUser = (directory: AccountDirectory) =>
  guard(authenticate(directory));

export const requireCapability = (
  directory: AccountDirectory,
  capability: Capability,
) => guard(authenticateWith(directory, capability));

export const requireAdmin = (directory: AccountDirectory) =>
  guard(authenticateAdmin(directory));

const ROLES: readonly string[] = [Role.Admin, Role.User];

const isAccount = (value: unknown): value is Account =>
  typeof value === "object" &&
  value !== null &&
  "username" in value &&
  "role" in value &&
  typeof value.role === "string" &&
  ROLES.includes(value.role);

/** The account a guard put on this response. */
export const currentAccount = (res: Response): Account => {
  const account: unknown = res.locals.account;
  // only reachable from a route mounted without a guard
  if (!isAccount(account)) throw new Error("No account on response");
  return account;
};
