import { z } from "zod";
import { modelObject, requiredText } from "../../../common/validation/rules";
import {
  PRODUCT_DESCRIPTION_MAX_LENGTH,
  PRODUCT_NAME_MAX_LENGTH,
  ProductMessages,
} from "../products.const";

export const productSchema = modelObject({
  name: requiredText(ProductMessages.NAME_REQUIRED).max(
    PRODUCT_NAME_MAX_LENGTH,
    ProductMessages.NAME_TOO_LONG,
  ),
  description: requiredText(ProductMessages.DESCRIPTION_REQUIRED).max(
    PRODUCT_DESCRIPTION_MAX_LENGTH,
    ProductMessages.DESCRIPTION_TOO_LONG,
  ),
  price: z
    .number({ error: ProductMessages.PRICE_MUST_BE_GREATER_THAN_ZERO })
    .gt(0, ProductMessages.PRICE_MUST_BE_GREATER_THAN_ZERO),
  stock: z
    .number({ error: ProductMessages.STOCK_MUST_BE_WHOLE_NUMBER })
    .int(ProductMessages.STOCK_MUST_BE_WHOLE_NUMBER)
    .gte(0, ProductMessages.STOCK_MUST_BE_NON_NEGATIVE),
});

export type ProductDto = z.infer<typeof productSchema>;
