export const ORDER_ENTITY = "Order";

export const ORDER_STATUSES = ["Pending", "Processing", "Shipped", "Delivered", "Cancelled"] as const;

export const OrderMessages = {
  CUSTOMER_ID_INVALID: "Customer ID must be a valid identifier",
  ORDER_DATE_INVALID: "Order date must be a valid ISO-8601 date-time",
  ITEMS_REQUIRED: "Order must contain at least one item",
  ITEM_INVALID: "Each order item must be an object",
  PRODUCT_ID_INVALID: "Product ID must be a valid identifier",
  QUANTITY_MUST_BE_WHOLE_NUMBER: "Quantity must be a whole number",
  QUANTITY_MUST_BE_GREATER_THAN_ZERO: "Quantity must be greater than 0",
  ITEM_PRICE_MUST_BE_GREATER_THAN_ZERO: "Item price must be greater than 0",
} as const;
