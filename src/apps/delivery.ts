import { AppOptions, createBaseApp } from "./base";
import { seedMembers, seedRestaurants } from "../data/seed";
import { Member, Restaurant } from "../models/types";
import { createRestaurantRoutes } from "../routes/restaurants";
import { createUserRoutes } from "../routes/users";
import { RecordStore } from "../stores/RecordStore";

export interface DeliveryAppOptions extends AppOptions {
  members?: RecordStore<Member>;
  restaurants?: RecordStore<Restaurant>;
}

export const createDeliveryApp = (options: DeliveryAppOptions = {}) => {
  const members =
    options.members ?? new RecordStore<Member>("User", seedMembers());
  const restaurants =
    options.restaurants ??
    new RecordStore<Restaurant>("Restaurant", seedRestaurants());

  return createBaseApp(options, (app) => {
    app.get("/", (req, res) => {
      res.json({
        message: "Welcome to the food delivery API!",
        docs: "See /users and /restaurants for the available resources",
      });
    });

    app.use("/users", createUserRoutes(members));
    app.use("/restaurants", createRestaurantRoutes(restaurants));
  });
};
