import { Request, Response } from "express";
import { Restaurant } from "../models/types";
import { RecordStore } from "../stores/RecordStore";
import {
  readField,
  requiredInt,
  requiredNumber,
  requiredString,
} from "../utils/params";

export class RestaurantController {
  constructor(private readonly restaurants: RecordStore<Restaurant>) {}

  listRestaurants = (req: Request, res: Response) => {
    res.json({ restaurants: this.restaurants.list() });
  };

  searchRestaurants = (req: Request, res: Response) => {
    const category = requiredString(readField(req, "category"), "category");
    const results = this.restaurants.filter((r) => r.category === category);
    res.json({ results });
  };

  getRestaurant = (req: Request, res: Response) => {
    const id = requiredInt(req.params.id, "restaurant_id");
    res.json(this.restaurants.getById(id));
  };

  createRestaurant = (req: Request, res: Response) => {
    const name = requiredString(readField(req, "name"), "name");
    const category = requiredString(readField(req, "category"), "category");
    const rating = requiredNumber(readField(req, "rating"), "rating");

    const restaurant = this.restaurants.create((id) => ({
      id,
      name,
      category,
      rating,
    }));

    res.status(201).json({ message: "Restaurant created", restaurant });
  };
}
