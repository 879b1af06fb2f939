import { HealthCheckService, MemoryHealthIndicator } from "@nestjs/terminus";
import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { HEAP_LIMIT_BYTES, HealthService } from "./health.service";

describe("HealthService", () => {
  let service: HealthService;
  let healthCheckService: { check: ReturnType<typeof vi.fn> };
  let memoryHealth: { checkHeap: ReturnType<typeof vi.fn> };

  beforeEach(async () => {
    healthCheckService = {
      check: vi.fn(async (indicators: Array<() => Promise<unknown>>) => {
        const results = await Promise.all(indicators.map((indicator) => indicator()));
        return { status: "ok", details: Object.assign({}, ...results) };
      }),
    };
    memoryHealth = {
      checkHeap: vi.fn().mockResolvedValue({ memory_heap: { status: "up" } }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HealthService,
        { provide: HealthCheckService, useValue: healthCheckService },
        { provide: MemoryHealthIndicator, useValue: memoryHealth },
      ],
    }).compile();

    service = module.get<HealthService>(HealthService);
  });

  it("checks the heap against the configured limit", async () => {
    const result = await service.checkHealth();

    expect(memoryHealth.checkHeap).toHaveBeenCalledWith("memory_heap", HEAP_LIMIT_BYTES);
    expect(result).toEqual({ status: "ok", details: { memory_heap: { status: "up" } } });
  });
});
