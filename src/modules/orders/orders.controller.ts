import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Post, Put, Res } from "@nestjs/common";
import type { Response } from "express";
import { EntityIdParam } from "../../common/decorators/zod-validation.decorator";
import { unwrapOutcome } from "../../common/errors";
import type { Order } from "./orders.interface";
import { OrdersService } from "./orders.service";

@Controller("api/orders")
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createOrder(
    @Body() body: unknown,
    @Res({ passthrough: true }) response: Response,
  ): Promise<Order> {
    const order = unwrapOutcome(await this.ordersService.create(body));
    response.setHeader("Location", `/api/orders/${order.id}`);
    return order;
  }

  @Put(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async updateOrder(@EntityIdParam("order") id: string, @Body() body: unknown): Promise<void> {
    unwrapOutcome(await this.ordersService.update(id, body));
  }

  @Get()
  async getOrders(): Promise<Order[]> {
    return unwrapOutcome(await this.ordersService.getAll());
  }

  @Get(":id")
  async getOrder(@EntityIdParam("order") id: string): Promise<Order> {
    return unwrapOutcome(await this.ordersService.getById(id));
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteOrder(@EntityIdParam("order") id: string): Promise<void> {
    unwrapOutcome(await this.ordersService.delete(id));
  }
}
