// backend/services/shared/test/env.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  loadEnvCascadeForService,
  optionalEnv,
  optionalList,
  requireEnum,
  requireEnv,
  requireNumber,
} from "../env";

describe("env getters", () => {
  it("requireEnv trims and fails fast on missing or blank values", () => {
    expect(requireEnv("A", { A: "  x  " })).toBe("x");
    expect(() => requireEnv("A", {})).toThrow("Missing required env var: A");
    expect(() => requireEnv("A", { A: "   " })).toThrow(
      "Missing required env var: A"
    );
  });

  it("optionalEnv returns undefined for blank values", () => {
    expect(optionalEnv("A", { A: "" })).toBeUndefined();
    expect(optionalEnv("A", { A: "v" })).toBe("v");
  });

  it("requireEnum accepts only listed values", () => {
    expect(requireEnum("M", ["a", "b"], { M: "b" })).toBe("b");
    expect(() => requireEnum("M", ["a", "b"], { M: "c" })).toThrow(
      'Invalid env var M="c". Allowed: a, b'
    );
  });

  it("requireNumber takes plain digits only", () => {
    expect(requireNumber("P", { P: "8080" })).toBe(8080);
    expect(() => requireNumber("P", { P: "80a" })).toThrow(
      'Env var P must be a number, got "80a"'
    );
    expect(() => requireNumber("P", { P: "-1" })).toThrow();
  });

  it("optionalList splits on commas and drops blanks", () => {
    expect(optionalList("L", { L: "a, b,,c " })).toEqual(["a", "b", "c"]);
    expect(optionalList("L", {})).toEqual([]);
  });
});

describe("loadEnvCascadeForService", () => {
  const touched = [
    "NODE_ENV",
    "CASCADE_SHARED",
    "CASCADE_OVERRIDE",
    "CASCADE_REF",
    "CASCADE_MODE_ONLY",
    "CASCADE_INJECTED",
  ];
  let saved: Record<string, string | undefined>;
  let root: string;
  let service: string;

  beforeEach(() => {
    saved = Object.fromEntries(touched.map((k) => [k, process.env[k]]));
    root = fs.mkdtempSync(path.join(os.tmpdir(), "env-cascade-"));
    service = path.join(root, "services", "calc");
    fs.mkdirSync(service, { recursive: true });
    fs.writeFileSync(path.join(root, "package.json"), "{}");
  });

  afterEach(() => {
    for (const [k, v] of Object.entries(saved)) {
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("loads root then service files, mode file last, without touching injected vars", () => {
    process.env.NODE_ENV = "dev";
    process.env.CASCADE_INJECTED = "injected";
    delete process.env.CASCADE_SHARED;
    delete process.env.CASCADE_OVERRIDE;
    delete process.env.CASCADE_REF;
    delete process.env.CASCADE_MODE_ONLY;

    fs.writeFileSync(
      path.join(root, ".env"),
      "CASCADE_SHARED=root\nCASCADE_OVERRIDE=root\nCASCADE_INJECTED=file\n"
    );
    fs.writeFileSync(
      path.join(service, ".env"),
      "CASCADE_OVERRIDE=service\nCASCADE_REF=${CASCADE_SHARED}-x\n"
    );
    fs.writeFileSync(
      path.join(service, ".env.dev"),
      "CASCADE_MODE_ONLY=dev\nCASCADE_OVERRIDE=service-dev\n"
    );

    const loaded = loadEnvCascadeForService(service);

    expect(loaded).toEqual([
      path.join(root, ".env"),
      path.join(service, ".env"),
      path.join(service, ".env.dev"),
    ]);
    expect(process.env.CASCADE_SHARED).toBe("root");
    expect(process.env.CASCADE_OVERRIDE).toBe("service-dev");
    expect(process.env.CASCADE_REF).toBe("root-x");
    expect(process.env.CASCADE_MODE_ONLY).toBe("dev");
    expect(process.env.CASCADE_INJECTED).toBe("injected");
  });

  it("dev mode without any env file fails fast", () => {
    process.env.NODE_ENV = "dev";
    expect(() => loadEnvCascadeForService(service)).toThrow(
      'No env files found for mode="dev"'
    );
  });

  it("test mode tolerates missing files", () => {
    process.env.NODE_ENV = "test";
    expect(loadEnvCascadeForService(service)).toEqual([]);
  });

  it("rejects an unknown NODE_ENV", () => {
    process.env.NODE_ENV = "staging";
    expect(() => loadEnvCascadeForService(service)).toThrow(
      'Invalid env var NODE_ENV="staging"'
    );
  });
});
