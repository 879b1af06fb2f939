import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Post, Put, Res } from "@nestjs/common";
import type { Response } from "express";
import { EntityIdParam } from "../../common/decorators/zod-validation.decorator";
import { unwrapOutcome } from "../../common/errors";
import type { Customer } from "./customers.interface";
import { CustomersService } from "./customers.service";

@Controller("api/customers")
export class CustomersController {
  constructor(private readonly customersService: CustomersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createCustomer(
    @Body() body: unknown,
    @Res({ passthrough: true }) response: Response,
  ): Promise<Customer> {
    const customer = unwrapOutcome(await this.customersService.create(body));
    response.setHeader("Location", `/api/customers/${customer.id}`);
    return customer;
  }

  @Put(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async updateCustomer(
    @EntityIdParam("customer") id: string,
    @Body() body: unknown,
  ): Promise<void> {
    unwrapOutcome(await this.customersService.update(id, body));
  }

  @Get()
  async getCustomers(): Promise<Customer[]> {
    return unwrapOutcome(await this.customersService.getAll());
  }

  @Get(":id")
  async getCustomer(@EntityIdParam("customer") id: string): Promise<Customer> {
    return unwrapOutcome(await this.customersService.getById(id));
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteCustomer(@EntityIdParam("customer") id: string): Promise<void> {
    unwrapOutcome(await this.customersService.delete(id));
  }
}
