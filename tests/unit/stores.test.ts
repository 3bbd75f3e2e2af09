import { describe, it, expect } from "@jest/globals";
import { SEED_ACCOUNTS } from "../../src/data/seed";
import { Member } from "../../src/models/types";
import { AccountDirectory } from "../../src/stores/AccountDirectory";
import { RecordStore } from "../../src/stores/RecordStore";
import { NotFoundError } from "../../src/utils/errors";

describe("RecordStore", () => {
  it("assigns ids 1..N in creation order on an empty store", () => {
    const store = new RecordStore<Member>("User");
    const names = ["a", "b", "c"];

    const created = names.map((name) =>
      store.create((id) => ({ id, name, email: `${name}@example.com` })),
    );

    expect(created.map((m) => m.id)).toEqual([1, 2, 3]);
    for (const member of created) {
      expect(store.getById(member.id)).toEqual(member);
    }
  });

  it("continues numbering after the seed", () => {
    const store = new RecordStore<Member>("User", [
      { id: 1, name: "a", email: "a@example.com" },
      { id: 2, name: "b", email: "b@example.com" },
    ]);

    expect(store.create((id) => ({ id, name: "c", email: "c@example.com" })).id).toBe(3);
    expect(store.size).toBe(3);
  });

  it("throws NotFound with the store label for an unknown id", () => {
    const store = new RecordStore<Member>("User");
    expect(store.findById(7)).toBeUndefined();
    expect(() => store.getById(7)).toThrow(new NotFoundError("User not found"));
  });

  it("hands out copies from list()", () => {
    const store = new RecordStore<Member>("User");
    store.list().push({ id: 9, name: "x", email: "x@example.com" });
    expect(store.size).toBe(0);
  });
});

describe("AccountDirectory", () => {
  it("removes an account so its token no longer resolves", () => {
    const directory = new AccountDirectory();

    expect(directory.removeByUsername("bob").email).toBe("bob@example.com");
    expect(directory.findByToken("bob_token")).toBeUndefined();
    expect(directory.findByToken("alice_token")?.username).toBe("alice");
  });

  it("throws NotFound for an unknown username", () => {
    const directory = new AccountDirectory();
    expect(() => directory.removeByUsername("carol")).toThrow(
      "User carol not found",
    );
  });

  it("leaves the seed table untouched", () => {
    new AccountDirectory().removeByUsername("alice");
    expect(Object.keys(SEED_ACCOUNTS)).toEqual(["alice_token", "bob_token"]);
  });
});
