// backend/services/calc/src/routes/calcRoutes.ts
import { Router } from "express";
import { somar } from "../controllers/calc/handlers/somar";
import { calcularMedia } from "../controllers/calc/handlers/calcularMedia";

/** Paths the auth gate must guard. */
export const CALC_PROTECTED_PATHS = ["/somar", "/calcular_media"] as const;

const router = Router();

router.post("/somar", somar);
router.post("/calcular_media", calcularMedia);

export default router;
