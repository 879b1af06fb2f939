import { z } from "zod";
import { entityId, isoDateTime, modelObject, oneOf } from "../../../common/validation/rules";
import { ORDER_STATUSES, OrderMessages } from "../orders.const";

const orderItemSchema = z.object(
  {
    productId: entityId(OrderMessages.PRODUCT_ID_INVALID),
    quantity: z
      .number({ error: OrderMessages.QUANTITY_MUST_BE_WHOLE_NUMBER })
      .int(OrderMessages.QUANTITY_MUST_BE_WHOLE_NUMBER)
      .gt(0, OrderMessages.QUANTITY_MUST_BE_GREATER_THAN_ZERO),
    price: z
      .number({ error: OrderMessages.ITEM_PRICE_MUST_BE_GREATER_THAN_ZERO })
      .gt(0, OrderMessages.ITEM_PRICE_MUST_BE_GREATER_THAN_ZERO),
  },
  { error: OrderMessages.ITEM_INVALID },
);

export const orderSchema = modelObject({
  customerId: entityId(OrderMessages.CUSTOMER_ID_INVALID),
  orderDateTime: isoDateTime(OrderMessages.ORDER_DATE_INVALID),
  status: oneOf("Status", ORDER_STATUSES),
  items: z
    .array(orderItemSchema, { error: OrderMessages.ITEMS_REQUIRED })
    .min(1, OrderMessages.ITEMS_REQUIRED),
});

export type OrderDto = z.infer<typeof orderSchema>;
