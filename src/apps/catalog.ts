import { AppOptions, createBaseApp } from "./base";
import { ProductController } from "../controllers/ProductController";
import { seedProducts } from "../data/seed";
import { paginationParams } from "../middleware/pagination";
import { Product } from "../models/types";
import { RecordStore } from "../stores/RecordStore";

export interface CatalogAppOptions extends AppOptions {
  products?: RecordStore<Product>;
}

export const createCatalogApp = (options: CatalogAppOptions = {}) => {
  const products =
    options.products ?? new RecordStore<Product>("Product", seedProducts());
  const controller = new ProductController(products);

  return createBaseApp(options, (app) => {
    app.get("/", controller.home);
    app.get("/products", paginationParams, controller.listProducts);
    app.get("/search", paginationParams, controller.searchProducts);
  });
};
