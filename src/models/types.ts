export enum Role {
  Admin = "admin",
  User = "user",
}

export interface Account {
  username: string;
  email: string;
  role: Role;
}

export interface Product {
  id: number;
  name: string;
  price: number;
}

// Users of the delivery service, unrelated to token accounts
export interface Member {
  id: number;
  name: string;
  email: string;
}

export interface Restaurant {
  id: number;
  name: string;
  category: string;
  rating: number;
}

export interface PaginationWindow {
  skip: number;
  limit: number;
}

export type WithId = { id: number };
