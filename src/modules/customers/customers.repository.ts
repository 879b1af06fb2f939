import { Injectable } from "@nestjs/common";
import { InMemoryRepository } from "../../common/data/in-memory.repository";
import type { Customer } from "./customers.interface";
import type { CustomerDto } from "./dto/customers.dto";

export const SEED_CUSTOMERS: readonly Customer[] = [
  {
    id: "bafda49f-f76a-4328-8c2f-c637d6e74e85",
    name: "John Doe",
    email: "john.doe@example.com",
    address: "456 Elm St, Anytown, USA",
  },
  {
    id: "ba4adcc3-adfc-443d-b760-01c5051dc4f1",
    name: "Jane Smith",
    email: "jane.smith@example.com",
    address: "123 Main St, Anytown, USA",
  },
  {
    id: "f5fba9a0-0745-4028-93f1-9053f5031b10",
    name: "Alice Johnson",
    email: "alice.johnson@example.com",
    address: "789 Oak St, Anytown, USA",
  },
];

@Injectable()
export class CustomersRepository extends InMemoryRepository<CustomerDto> {
  constructor() {
    super(SEED_CUSTOMERS);
  }
}
