import { Request, Response } from "express";
import { authUserId } from "../../shared/auth/auth.middleware";
import { loginSchema, registerSchema } from "./auth.dto";
import { AuthService } from "./auth.service";

export class AuthController {
  static async register(req: Request, res: Response): Promise<void> {
    const input = registerSchema.parse(req.body);
    const result = await AuthService.register(input);
    res.status(201).json(result);
  }

  static async login(req: Request, res: Response): Promise<void> {
    const input = loginSchema.parse(req.body);
    const result = await AuthService.login(input);
    res.json(result);
  }

  static async me(req: Request, res: Response): Promise<void> {
    const data = await AuthService.me(authUserId(req));
    res.json({ data });
  }
}
