import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Post, Put, Res } from "@nestjs/common";
import type { Response } from "express";
import { EntityIdParam } from "../../common/decorators/zod-validation.decorator";
import { unwrapOutcome } from "../../common/errors";
import type { Payment } from "./payments.interface";
import { PaymentsService } from "./payments.service";

@Controller("api/payments")
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createPayment(
    @Body() body: unknown,
    @Res({ passthrough: true }) response: Response,
  ): Promise<Payment> {
    const payment = unwrapOutcome(await this.paymentsService.create(body));
    response.setHeader("Location", `/api/payments/${payment.id}`);
    return payment;
  }

  @Put(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async updatePayment(@EntityIdParam("payment") id: string, @Body() body: unknown): Promise<void> {
    unwrapOutcome(await this.paymentsService.update(id, body));
  }

  @Get()
  async getPayments(): Promise<Payment[]> {
    return unwrapOutcome(await this.paymentsService.getAll());
  }

  @Get(":id")
  async getPayment(@EntityIdParam("payment") id: string): Promise<Payment> {
    return unwrapOutcome(await this.paymentsService.getById(id));
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async deletePayment(@EntityIdParam("payment") id: string): Promise<void> {
    unwrapOutcome(await this.paymentsService.delete(id));
  }
}
