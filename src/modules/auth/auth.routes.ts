import { Router } from "express";
import { asyncHandler } from "../../shared/http/async-handler";
import { requireAuth } from "../../shared/auth/auth.middleware";
import { AuthController } from "./auth.controller";

export const authRouter = Router();

authRouter.post("/register", asyncHandler(AuthController.register));
authRouter.post("/login", asyncHandler(AuthController.login));
authRouter.get("/me", requireAuth, asyncHandler(AuthController.me));
