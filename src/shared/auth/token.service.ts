import jwt from "jsonwebtoken";
import { z } from "zod";
import { env } from "../../config/env";

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
});

export type AccessTokenPayload = z.infer<typeof accessTokenPayloadSchema>;

export const tokenService = {
  signAccessToken(payload: AccessTokenPayload): string {
    return jwt.sign(payload, env.JWT_ACCESS_SECRET, {
      expiresIn: env.JWT_ACCESS_TTL as jwt.SignOptions["expiresIn"],
    });
  },
  verifyAccessToken(token: string): AccessTokenPayload {
    const decoded = jwt.verify(token, env.JWT_ACCESS_SECRET);
    return accessTokenPayloadSchema.parse(decoded);
  },
};
