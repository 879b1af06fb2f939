import { Injectable } from "@nestjs/common";
import { ModelValidator } from "../../common/validation/model-validator";
import { type ProductDto, productSchema } from "./dto/products.dto";

@Injectable()
export class ProductValidator extends ModelValidator<ProductDto> {
  constructor() {
    super(productSchema);
  }
}
