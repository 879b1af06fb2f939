import { Injectable } from "@nestjs/common";
import { InMemoryRepository } from "../../common/data/in-memory.repository";
import type { OrderDto } from "./dto/orders.dto";

@Injectable()
export class OrdersRepository extends InMemoryRepository<OrderDto> {}
