import { Injectable } from "@nestjs/common";
import { ModelValidator } from "../../common/validation/model-validator";
import { type CustomerDto, customerSchema } from "./dto/customers.dto";

@Injectable()
export class CustomerValidator extends ModelValidator<CustomerDto> {
  constructor() {
    super(customerSchema);
  }
}
