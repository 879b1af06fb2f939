import { Logger } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProductInput } from "../../shared/helper.fixtures";
import { ProductsRepository, SEED_PRODUCTS } from "./products.repository";
import { ProductsService } from "./products.service";
import { ProductValidator } from "./products.validator";

describe("ProductsService", () => {
  let service: ProductsService;

  beforeEach(async () => {
    vi.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [ProductsService, ProductsRepository, ProductValidator],
    }).compile();

    service = module.get<ProductsService>(ProductsService);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts with the seeded catalog", async () => {
    expect(await service.getAll()).toEqual({ ok: true, value: SEED_PRODUCTS });
  });

  it("creates a product that can be read back", async () => {
    const created = await service.create(createProductInput());
    if (!created.ok) {
      throw new Error("Expected create to succeed");
    }

    expect(await service.getById(created.value.id)).toEqual({ ok: true, value: created.value });
  });

  it("replaces the fields of an existing product", async () => {
    const [laptop] = SEED_PRODUCTS;
    if (!laptop) {
      throw new Error("Seed catalog is empty");
    }
    const changes = createProductInput({ name: "Laptop Pro", price: 1299 });

    expect(await service.update(laptop.id, changes)).toEqual({ ok: true, value: undefined });
    expect(await service.getById(laptop.id)).toEqual({
      ok: true,
      value: { ...changes, id: laptop.id },
    });
  });

  it("rejects an invalid price with the price message only", async () => {
    expect(await service.create(createProductInput({ price: 0 }))).toEqual({
      ok: false,
      failure: { kind: "validation", errors: { price: ["Price must be greater than 0"] } },
    });
  });

  it("reports the second delete of the same product as not found", async () => {
    const [, smartphone] = SEED_PRODUCTS;
    if (!smartphone) {
      throw new Error("Seed catalog is too small");
    }

    expect(await service.delete(smartphone.id)).toEqual({ ok: true, value: undefined });
    expect(await service.delete(smartphone.id)).toEqual({
      ok: false,
      failure: {
        kind: "not-found",
        message: `Entity "Product" (${smartphone.id}) was not found.`,
      },
    });
  });
});
