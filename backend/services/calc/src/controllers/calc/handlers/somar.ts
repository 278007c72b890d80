// backend/services/calc/src/controllers/calc/handlers/somar.ts
import type { RequestHandler } from "express";
import { respond } from "@shared/contracts/common";
import { safeCoerceToIntegers, sumIntegers } from "../../../lib/numbers";
import { coercionProblem, invalidBody } from "./problems";
import { zNumerosBody, zSumResponse } from "./schemas";

/** POST /somar  { numeros } → { resultado } (exact, any size) */
export const somar: RequestHandler = (req, res) => {
  const body = zNumerosBody.safeParse(req.body);
  if (!body.success) return invalidBody(res, body.error);

  const list = safeCoerceToIntegers(body.data.numeros, {
    allowEmpty: false,
    operation: "sum",
  });
  if (!list.ok) {
    req.log.info({ reason: list.error.name }, "sum rejected");
    return coercionProblem(res, list.error);
  }

  const resultado = sumIntegers(list.value);
  req.log.info(
    { op: "sum", count: list.value.length, resultado: resultado.toString() },
    "sum computed"
  );
  return respond(res, zSumResponse, { resultado });
};
