import { Injectable } from "@nestjs/common";
import { HealthCheckResult, HealthCheckService, MemoryHealthIndicator } from "@nestjs/terminus";

export const HEAP_LIMIT_BYTES = 512 * 1024 * 1024;

@Injectable()
export class HealthService {
  constructor(
    private readonly healthCheckService: HealthCheckService,
    private readonly memoryHealth: MemoryHealthIndicator,
  ) {}

  async checkHealth(): Promise<HealthCheckResult> {
    return this.healthCheckService.check([
      () => this.memoryHealth.checkHeap("memory_heap", HEAP_LIMIT_BYTES),
    ]);
  }
}
