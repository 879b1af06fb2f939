export const PRODUCT_ENTITY = "Product";

export const PRODUCT_NAME_MAX_LENGTH = 100;
export const PRODUCT_DESCRIPTION_MAX_LENGTH = 500;

export const ProductMessages = {
  NAME_REQUIRED: "Name is required",
  NAME_TOO_LONG: `Name cannot exceed ${PRODUCT_NAME_MAX_LENGTH} characters`,
  DESCRIPTION_REQUIRED: "Description is required",
  DESCRIPTION_TOO_LONG: `Description cannot exceed ${PRODUCT_DESCRIPTION_MAX_LENGTH} characters.`,
  PRICE_MUST_BE_GREATER_THAN_ZERO: "Price must be greater than 0",
  STOCK_MUST_BE_WHOLE_NUMBER: "Stock must be a whole number",
  STOCK_MUST_BE_NON_NEGATIVE: "Stock must be non-negative",
} as const;
