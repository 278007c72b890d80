// backend/services/calc/src/controllers/calc/handlers/calcularMedia.ts
import type { RequestHandler } from "express";
import { respond } from "@shared/contracts/common";
import { meanOfIntegers, safeCoerceToIntegers } from "../../../lib/numbers";
import { coercionProblem, invalidBody } from "./problems";
import { zMeanResponse, zNumerosBody } from "./schemas";

/** POST /calcular_media  { numeros } → { media } (null when the list is empty) */
export const calcularMedia: RequestHandler = (req, res) => {
  const body = zNumerosBody.safeParse(req.body);
  if (!body.success) return invalidBody(res, body.error);

  const list = safeCoerceToIntegers(body.data.numeros, {
    allowEmpty: true,
    operation: "mean",
  });
  if (!list.ok) {
    req.log.info({ reason: list.error.name }, "mean rejected");
    return coercionProblem(res, list.error);
  }

  const media = meanOfIntegers(list.value);
  req.log.info({ op: "mean", count: list.value.length, media }, "mean computed");
  return respond(res, zMeanResponse, { media });
};
