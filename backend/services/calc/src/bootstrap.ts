// backend/services/calc/src/bootstrap.ts
// Side-effect module: load the env cascade before anything reads process.env.
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadEnvCascadeForService } from "@shared/env";

const SERVICE_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  ".."
);

export const loadedEnvFiles = loadEnvCascadeForService(SERVICE_ROOT);
