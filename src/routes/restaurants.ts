import { Router } from "express";
import { RestaurantController } from "../controllers/RestaurantController";
import { Restaurant } from "../models/types";
import { RecordStore } from "../stores/RecordStore";

export function createRestaurantRoutes(restaurants: RecordStore<Restaurant>) {
  const router = Router();
  const controller = new RestaurantController(restaurants);

  router.get("/", controller.listRestaurants);
  // Must stay above "/:id", otherwise "search" is taken as an id
  router.get("/search", controller.searchRestaurants);
  router.get("/:id", controller.getRestaurant);
  router.post("/", controller.createRestaurant);

  return router;
}
