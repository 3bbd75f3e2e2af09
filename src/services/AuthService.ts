import { Account, Role } from "../models/types";
import { AccountDirectory } from "../stores/AccountDirectory";
import {
  ForbiddenError,
  HttpError,
  UnauthenticatedError,
} from "../utils/errors";

export type Result<T, E = HttpError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type Step<I, O> = (input: I) => Result<O>;

const ok = <T>(value: T): Result<T> => ({ ok: true, value });
const fail = (error: HttpError): { ok: false; error: HttpError } => ({
  ok: false,
  error,
});

/** Runs `first`, then `second` on its value; stops at the first failure. */
export const pipe =
  <A, B, C>(first: Step<A, B>, second: Step<B, C>): Step<A, C> =>
  (input) => {
    const result = first(input);
    return result.ok ? second(result.value) : result;
  };

export type Capability = "read:profile" | "admin:panel" | "admin:delete-user";

const CAPABILITIES: Record<Role, readonly Capability[]> = {
  [Role.Admin]: ["read:profile", "admin:panel", "admin:delete-user"],
  [Role.User]: ["read:profile"],
};

export const can = (account: Account, capability: Capability): boolean =>
  CAPABILITIES[account.role].includes(capability);

export const requireToken: Step<string | undefined, string> = (token) =>
  token ? ok(token) : fail(new UnauthenticatedError("Token missing"));

export const resolveAccount =
  (directory: AccountDirectory): Step<string, Account> =>
  (token) => {
    const account = directory.findByToken(token);
    return account ? ok(account) : fail(new UnauthenticatedError("Invalid token"));
  };

export const authorize =
  (capability: Capability): Step<Account, Account> =>
  (account) =>
    can(account, capability)
      ? ok(account)
      : fail(new ForbiddenError("Admin privileges required"));

export const authenticate = (
  directory: AccountDirectory,
): Step<string | undefined, Account> =>
  pipe(requireToken, resolveAccount(directory));

export const authenticateWith = (
  directory: AccountDirectory,
  capability: Capability,
): Step<string | undefined, Account> =>
  pipe(authenticate(directory), authorize(capability));

export const authenticateAdmin = (
  directory: AccountDirectory,
): Step<string | undefined, Account> =>
  authenticateWith(directory, "admin:panel");
