import type { WithId } from "../../common/data/repository.interface";
import type { ProductDto } from "./dto/products.dto";

export type Product = WithId<ProductDto>;
