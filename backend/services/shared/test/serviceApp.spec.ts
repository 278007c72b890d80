// backend/services/shared/test/serviceApp.spec.ts
import { describe, it, expect } from "vitest";
import request from "supertest";
import pino from "pino";
import { createServiceApp } from "../app/createServiceApp";
import { pickRequestId } from "../middleware/requestId";
import { startHttpService } from "../bootstrap/startHttpService";
import { clientErrorName } from "../middleware/problemJson";

const logger = pino({ level: "silent" });

function buildApp() {
  return createServiceApp({
    serviceName: "test",
    logger,
    healthPath: "/ping",
    bodyLimit: "64b",
    mountRoutes: (api) => {
      api.post("/echo", (req, res) => {
        res.json(req.body);
      });
      api.get("/boom", () => {
        throw new Error("boom");
      });
    },
  });
}

describe("createServiceApp", () => {
  it("serves health on the configured path and on /healthz", async () => {
    const app = buildApp();
    expect((await request(app).get("/ping").expect(200)).body).toEqual({
      status: "ok",
    });
    expect((await request(app).get("/healthz").expect(200)).body).toEqual({
      status: "ok",
    });
  });

  it("echoes a caller-supplied request id", async () => {
    const res = await request(buildApp())
      .get("/ping")
      .set("x-request-id", "req-123");
    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("mints a request id when none is supplied", async () => {
    const res = await request(buildApp()).get("/ping");
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("does not advertise the framework", async () => {
    const res = await request(buildApp()).get("/ping");
    expect(res.headers["x-powered-by"]).toBeUndefined();
  });

  it("unknown route → 404 problem", async () => {
    const res = await request(buildApp())
      .get("/nope")
      .set("x-request-id", "req-404")
      .expect(404);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: "Route not found",
      instance: "req-404",
    });
  });

  it("malformed JSON → 400 BAD_REQUEST", async () => {
    const res = await request(buildApp())
      .post("/echo")
      .set("Content-Type", "application/json")
      .send('{"a": [1,')
      .expect(400);
    expect(res.body).toMatchObject({ status: 400, code: "BAD_REQUEST" });
  });

  it("oversized body → 413 PAYLOAD_TOO_LARGE", async () => {
    const res = await request(buildApp())
      .post("/echo")
      .send({ filler: "x".repeat(200) })
      .expect(413);
    expect(res.body).toMatchObject({
      status: 413,
      title: "Payload Too Large",
      code: "PAYLOAD_TOO_LARGE",
    });
  });

  it("unsupported charset → 415 with its own title and code", async () => {
    const res = await request(buildApp())
      .post("/echo")
      .set("Content-Type", "application/json; charset=latin1")
      .send('{"a":1}')
      .expect(415);
    expect(res.body).toMatchObject({
      status: 415,
      title: "Unsupported Media Type",
      code: "UNSUPPORTED_MEDIA_TYPE",
    });
  });

  it("unexpected errors → generic 500 without internals", async () => {
    const res = await request(buildApp())
      .get("/boom")
      .set("x-request-id", "req-500")
      .expect(500);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: "An unexpected error occurred.",
      instance: "req-500",
    });
  });
});

describe("clientErrorName", () => {
  it("names known statuses and falls back for the rest", () => {
    expect(clientErrorName(413)).toEqual({
      title: "Payload Too Large",
      code: "PAYLOAD_TOO_LARGE",
    });
    expect(clientErrorName(418)).toEqual({
      title: "Client Error",
      code: "HTTP_418",
    });
  });
});

describe("pickRequestId", () => {
  it("prefers x-request-id, then correlation and trace ids", () => {
    expect(pickRequestId({ "x-request-id": " a ", "x-correlation-id": "b" })).toBe("a");
    expect(pickRequestId({ "x-correlation-id": "b" })).toBe("b");
    expect(pickRequestId({ "x-amzn-trace-id": "c" })).toBe("c");
    expect(pickRequestId({})).toBeUndefined();
  });
});

describe("startHttpService", () => {
  it("binds an ephemeral port and stops cleanly", async () => {
    const started = await startHttpService({
      app: buildApp(),
      port: 0,
      serviceName: "test",
      logger,
    });
    expect(started.boundPort).toBeGreaterThan(0);
    expect(started.server.listening).toBe(true);

    await started.stop();
    expect(started.server.listening).toBe(false);
  });
});
