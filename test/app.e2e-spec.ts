import { HttpStatus, type INestApplication } from "@nestjs/common";
import request from "supertest";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { PROBLEM_TYPES } from "../src/common/errors/error-mapper";
import { createTestApp } from "./helpers";

describe("Application E2E Tests", () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it("reports liveness on /health", async () => {
    const response = await request(app.getHttpServer()).get("/health");

    expect(response.status).toBe(HttpStatus.OK);
    expect(response.body.status).toBe("ok");
    expect(response.body.info).toEqual({ memory_heap: { status: "up" } });
  });

  it("answers unknown routes with a not-found problem", async () => {
    const response = await request(app.getHttpServer()).get("/api/unknown?x=1");

    expect(response.status).toBe(HttpStatus.NOT_FOUND);
    expect(response.body).toMatchObject({
      type: PROBLEM_TYPES.NOT_FOUND,
      title: "Not Found",
      status: 404,
      detail: "Cannot GET /api/unknown?x=1",
      instance: "/api/unknown",
    });
    expect(typeof response.body.traceId).toBe("string");
  });
});
