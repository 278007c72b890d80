// backend/services/shared/test/authGate.spec.ts
import { describe, it, expect } from "vitest";
import express from "express";
import request from "supertest";
import pino from "pino";
import { authGate, normalizeRoutePath } from "../middleware/authGate";
import { issueAccessToken } from "../security/accessToken";

const keys = { secret: "test-secret", algorithm: "HS256" as const };
const logger = pino({ level: "silent" });

function buildApp() {
  const app = express();
  app.use(authGate({ ...keys, protectedPaths: ["/somar"], logger }));
  const echo: express.RequestHandler = (req, res) => {
    res.json({ auth: req.auth });
  };
  app.post("/somar", echo);
  app.get("/open", echo);
  return app;
}

describe("normalizeRoutePath", () => {
  it.each([
    ["/somar", "/somar"],
    ["/Somar/", "/somar"],
    ["/SOMAR//", "/somar"],
    ["/", "/"],
    ["///", "/"],
  ])("%s → %s", (input, expected) => {
    expect(normalizeRoutePath(input)).toBe(expected);
  });
});

describe("authGate", () => {
  it("requires a secret", () => {
    expect(() =>
      authGate({ ...keys, secret: "", protectedPaths: [], logger })
    ).toThrow("authGate: secret is required");
  });

  it("unprotected paths pass through as unauthenticated", async () => {
    const res = await request(buildApp()).get("/open").expect(200);
    expect(res.body).toEqual({ auth: { state: "unauthenticated" } });
  });

  it("protected path without a credential → generic 401", async () => {
    const res = await request(buildApp()).post("/somar").expect(401);
    expect(res.headers["www-authenticate"]).toBe("Bearer");
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Unauthorized",
      status: 401,
      code: "UNAUTHORIZED",
      detail: "Invalid or missing credentials",
    });
  });

  it("case and trailing-slash variants are guarded too", async () => {
    await request(buildApp()).post("/SOMAR").expect(401);
    await request(buildApp()).post("/somar/").expect(401);
  });

  it("a valid token reaches the handler with the identity attached", async () => {
    const t = issueAccessToken("admin", { ...keys, ttlSec: 60 });
    const res = await request(buildApp())
      .post("/somar")
      .set("Authorization", `Bearer ${t.accessToken}`)
      .expect(200);
    expect(res.body.auth).toMatchObject({
      state: "authenticated",
      subject: "admin",
      role: "administrator",
    });
  });

  it("a token signed with another secret is rejected", async () => {
    const t = issueAccessToken("tester", {
      ...keys,
      secret: "other-secret",
      ttlSec: 60,
    });
    await request(buildApp())
      .post("/somar")
      .set("Authorization", `Bearer ${t.accessToken}`)
      .expect(401);
  });
});
