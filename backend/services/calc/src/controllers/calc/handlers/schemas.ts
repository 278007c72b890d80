// backend/services/calc/src/controllers/calc/handlers/schemas.ts
import { z } from "zod";

/** `numeros` stays unknown here; the coercion pipeline owns its validation. */
export const zNumerosBody = z.object({ numeros: z.unknown() });

export const zSumResponse = z.object({ resultado: z.bigint() }).strict();

export const zMeanResponse = z.object({ media: z.number().nullable() }).strict();
