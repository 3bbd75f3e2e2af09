import { Account, Member, Product, Restaurant, Role } from "../models/types";

// Token table for the accounts service. Frozen; each app copies it.
export const SEED_ACCOUNTS: Readonly<Record<string, Readonly<Account>>> =
  Object.freeze({
    alice_token: Object.freeze({
      username: "alice",
      email: "alice@example.com",
      role: Role.Admin,
    }),
    bob_token: Object.freeze({
      username: "bob",
      email: "bob@example.com",
      role: Role.User,
    }),
  });

export const CATALOG_SIZE = 100;

export const seedProducts = (count: number = CATALOG_SIZE): Product[] =>
  Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    name: `Product ${i + 1}`,
    price: (i + 1) * 1000,
  }));

export const seedMembers = (): Member[] => [
  { id: 1, name: "Kim Chulsoo", email: "kim@example.com" },
  { id: 2, name: "Lee Younghee", email: "lee@example.com" },
];

export const seedRestaurants = (): Restaurant[] => [
  { id: 1, name: "Tasty Chicken", category: "chicken", rating: 4.5 },
  { id: 2, name: "Happy Pizza", category: "pizza", rating: 4.8 },
];
