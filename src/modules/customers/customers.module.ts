import { Module } from "@nestjs/common";
import { CustomersController } from "./customers.controller";
import { CustomersRepository } from "./customers.repository";
import { CustomersService } from "./customers.service";
import { CustomerValidator } from "./customers.validator";

@Module({
  controllers: [CustomersController],
  providers: [CustomersService, CustomersRepository, CustomerValidator],
})
export class CustomersModule {}
