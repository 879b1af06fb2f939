import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Post, Put, Res } from "@nestjs/common";
import type { Response } from "express";
import { EntityIdParam } from "../../common/decorators/zod-validation.decorator";
import { unwrapOutcome } from "../../common/errors";
import type { Product } from "./products.interface";
import { ProductsService } from "./products.service";

@Controller("api/products")
export class ProductsController {
  constructor(private readonly productsService: ProductsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createProduct(
    @Body() body: unknown,
    @Res({ passthrough: true }) response: Response,
  ): Promise<Product> {
    const product = unwrapOutcome(await this.productsService.create(body));
    response.setHeader("Location", `/api/products/${product.id}`);
    return product;
  }

  @Put(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async updateProduct(@EntityIdParam("product") id: string, @Body() body: unknown): Promise<void> {
    unwrapOutcome(await this.productsService.update(id, body));
  }

  @Get()
  async getProducts(): Promise<Product[]> {
    return unwrapOutcome(await this.productsService.getAll());
  }

  @Get(":id")
  async getProduct(@EntityIdParam("product") id: string): Promise<Product> {
    return unwrapOutcome(await this.productsService.getById(id));
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteProduct(@EntityIdParam("product") id: string): Promise<void> {
    unwrapOutcome(await this.productsService.delete(id));
  }
}
