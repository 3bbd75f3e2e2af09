import { SEED_ACCOUNTS } from "../data/seed";
import { Account } from "../models/types";
import { NotFoundError } from "../utils/errors";

export class AccountDirectory {
  private readonly byToken: Map<string, Account>;

  constructor(seed: Readonly<Record<string, Readonly<Account>>> = SEED_ACCOUNTS) {
    this.byToken = new Map(
      Object.entries(seed).map(([token, account]) => [token, { ...account }]),
    );
  }

  findByToken(token: string): Account | undefined {
    return this.byToken.get(token);
  }

  findByUsername(username: string): Account | undefined {
    for (const account of this.byToken.values()) {
      if (account.username === username) return account;
    }
    return undefined;
  }

  /** Drops the account and every token that maps to it. */
  removeByUsername(username: string): Account {
    const account = this.findByUsername(username);
    if (!account) throw new NotFoundError(`User ${username} not found`);

    for (const [token, candidate] of this.byToken) {
      if (candidate.username === username) this.byToken.delete(token);
    }
    return account;
  }
}
