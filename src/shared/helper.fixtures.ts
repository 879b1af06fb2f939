import type { CustomerDto } from "../modules/customers/dto/customers.dto";
import type { OrderDto } from "../modules/orders/dto/orders.dto";
import type { PaymentDto } from "../modules/payments/dto/payments.dto";
import type { ProductDto } from "../modules/catalog/dto/products.dto";

/**
 * Valid request models for tests. Override single fields to break one rule at a time.
 */

export const FIXTURE_CUSTOMER_ID = "9b2f6a64-3f55-4c0e-8d43-2c5e7a1f0b21";
export const FIXTURE_PRODUCT_ID = "3c8e1d27-6b4a-4f19-a2d5-7e0f9c3b8a64";
export const FIXTURE_ORDER_ID = "e41a7c90-2d6b-4b8e-9f13-5a0c8d2e6b77";

export function createCustomerInput(overrides: Partial<CustomerDto> = {}): CustomerDto {
  return {
    name: "Grace Hopper",
    email: "grace@example.com",
    address: "1 Harbor Road",
    ...overrides,
  };
}

export function createProductInput(overrides: Partial<ProductDto> = {}): ProductDto {
  return {
    name: "Keyboard",
    description: "Mechanical keyboard",
    price: 49.5,
    stock: 20,
    ...overrides,
  };
}

export function createOrderInput(overrides: Partial<OrderDto> = {}): OrderDto {
  return {
    customerId: FIXTURE_CUSTOMER_ID,
    orderDateTime: "2024-03-01T10:15:00Z",
    status: "Pending",
    items: [{ productId: FIXTURE_PRODUCT_ID, quantity: 2, price: 49.5 }],
    ...overrides,
  };
}

export function createPaymentInput(overrides: Partial<PaymentDto> = {}): PaymentDto {
  return {
    orderId: FIXTURE_ORDER_ID,
    amount: 99,
    status: "Completed",
    method: "CreditCard",
    paymentDate: "2024-03-01T10:20:00+01:00",
    txId: "tx-0001",
    ...overrides,
  };
}
