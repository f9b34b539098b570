import bcrypt from "bcryptjs";
import { env } from "../../config/env";
import { tokenService } from "../../shared/auth/token.service";
import { storage } from "../../shared/db/storage";
import { ApiError } from "../../shared/http/api-error";
import { createLogger } from "../../shared/logging/logger";
import { DuplicateEmailError, type UserRecord } from "../../shared/storage/storage.types";
import type { LoginInput, RegisterInput } from "./auth.dto";

const log = createLogger("auth");

export type PublicUser = Pick<UserRecord, "id" | "email" | "displayName" | "createdAt">;

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toPublicUser(user: UserRecord): PublicUser {
  return { id: user.id, email: user.email, displayName: user.displayName, createdAt: user.createdAt };
}

function issueSession(user: UserRecord) {
  return {
    accessToken: tokenService.signAccessToken({ sub: user.id, email: user.email }),
    user: toPublicUser(user),
  };
}

export class AuthService {
  static async register(input: RegisterInput) {
    const email = normalizeEmail(input.email);

    const existing = await storage.users.findByEmail(email);
    if (existing) {
      throw new ApiError(409, "Email is already registered");
    }

    const passwordHash = await bcrypt.hash(input.password, env.BCRYPT_ROUNDS);
    let user: UserRecord;
    try {
      user = await storage.users.create({ email, passwordHash, displayName: input.displayName });
    } catch (err) {
      // Another registration for the same email got in after the lookup above.
      if (err instanceof DuplicateEmailError) {
        throw new ApiError(409, "Email is already registered");
      }
      throw err;
    }

    log.info("USER_AUTH_REGISTER", { userId: user.id });
    return issueSession(user);
  }

  static async login(input: LoginInput) {
    const user = await storage.users.findByEmail(normalizeEmail(input.email));
    if (!user) {
      throw new ApiError(401, "Invalid credentials");
    }

    const ok = await bcrypt.compare(input.password, user.passwordHash);
    if (!ok) {
      log.warn("USER_AUTH_LOGIN_FAILED", { userId: user.id });
      throw new ApiError(401, "Invalid credentials");
    }

    log.info("USER_AUTH_LOGIN_SUCCESS", { userId: user.id });
    return issueSession(user);
  }

  static async me(userId: string): Promise<PublicUser> {
    const user = await storage.users.findById(userId);
    if (!user) {
      throw new ApiError(404, "User not found");
    }
    return toPublicUser(user);
  }
}
