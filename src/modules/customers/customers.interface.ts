import type { WithId } from "../../common/data/repository.interface";
import type { CustomerDto } from "./dto/customers.dto";

export type Customer = WithId<CustomerDto>;
