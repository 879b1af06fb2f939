import { Injectable } from "@nestjs/common";
import { InMemoryRepository } from "../../common/data/in-memory.repository";
import type { ProductDto } from "./dto/products.dto";
import type { Product } from "./products.interface";

export const SEED_PRODUCTS: readonly Product[] = [
  {
    id: "6dbad659-57f9-4639-b7b6-d7ef1c75321a",
    name: "Laptop",
    description: "A high-performance laptop.",
    price: 999.99,
    stock: 10,
  },
  {
    id: "05ac7e30-a71c-4cf5-b7c1-01507aa70a31",
    name: "Smartphone",
    description: "A latest model smartphone.",
    price: 699.99,
    stock: 100,
  },
  {
    id: "cbbb4fb6-1dbe-4e58-9fa0-f693b2c77229",
    name: "Headphones",
    description: "Noise-cancelling headphones.",
    price: 199.99,
    stock: 50,
  },
];

@Injectable()
export class ProductsRepository extends InMemoryRepository<ProductDto> {
  constructor() {
    super(SEED_PRODUCTS);
  }
}
