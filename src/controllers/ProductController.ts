import { Request, Response } from "express";
import { currentPagination } from "../middleware/pagination";
import { Product } from "../models/types";
import { RecordStore } from "../stores/RecordStore";
import { paginate } from "../utils/pagination";
import { readField, requiredString } from "../utils/params";

export class ProductController {
  constructor(private readonly products: RecordStore<Product>) {}

  home = (req: Request, res: Response) => {
    res.json({ message: "Product catalog. Try /products or /search?keyword=" });
  };

  listProducts = (req: Request, res: Response) => {
    const { skip, limit } = currentPagination(res);

    res.json({
      total: this.products.size,
      skip,
      limit,
      products: paginate(this.products.list(), { skip, limit }),
    });
  };

  // Exact, case-sensitive substring match on the name
  searchProducts = (req: Request, res: Response) => {
    const keyword = requiredString(readField(req, "keyword"), "keyword");
    const { skip, limit } = currentPagination(res);

    const filtered = this.products.filter((p) => p.name.includes(keyword));

    res.json({
      keyword,
      total_results: filtered.length,
      skip,
      limit,
      results: paginate(filtered, { skip, limit }),
    });
  };
}
