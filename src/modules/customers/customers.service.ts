import { Injectable } from "@nestjs/common";
import { EntityService } from "../../common/services/entity.service";
import { CUSTOMER_ENTITY } from "./customers.const";
import { CustomersRepository } from "./customers.repository";
import { CustomerValidator } from "./customers.validator";
import type { CustomerDto } from "./dto/customers.dto";

@Injectable()
export class CustomersService extends EntityService<CustomerDto> {
  constructor(customersRepository: CustomersRepository, customerValidator: CustomerValidator) {
    super(CUSTOMER_ENTITY, customersRepository, customerValidator);
  }
}
