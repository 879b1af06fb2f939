import type { WithId } from "../../common/data/repository.interface";
import type { OrderDto } from "./dto/orders.dto";

export type Order = WithId<OrderDto>;
