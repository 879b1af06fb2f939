import { Module } from "@nestjs/common";
import { ProductsController } from "./products.controller";
import { ProductsRepository } from "./products.repository";
import { ProductsService } from "./products.service";
import { ProductValidator } from "./products.validator";

@Module({
  controllers: [ProductsController],
  providers: [ProductsService, ProductsRepository, ProductValidator],
})
export class CatalogModule {}
