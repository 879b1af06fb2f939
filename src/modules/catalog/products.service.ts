import { Injectable } from "@nestjs/common";
import { EntityService } from "../../common/services/entity.service";
import type { ProductDto } from "./dto/products.dto";
import { PRODUCT_ENTITY } from "./products.const";
import { ProductsRepository } from "./products.repository";
import { ProductValidator } from "./products.validator";

@Injectable()
export class ProductsService extends EntityService<ProductDto> {
  constructor(productsRepository: ProductsRepository, productValidator: ProductValidator) {
    super(PRODUCT_ENTITY, productsRepository, productValidator);
  }
}
