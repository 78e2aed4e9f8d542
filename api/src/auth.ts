// api/src/auth.ts
// Tokens are issued by the account service; this API only verifies them.
import type { Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { AppError } from "./middleware/errorHandler.js";
import type { AuthRequest } from "./types.js";

// guard for protected routes
export function requireAuth(secret: string): RequestHandler {
  return (req: AuthRequest, _res: Response, next: NextFunction) => {
    const h = req.headers.authorization;
    const token = h?.startsWith("Bearer ") ? h.slice(7) : null;
    if (!token) return next(new AppError("No authentication token provided", 401));

    try {
      const decoded = jwt.verify(token, secret);
      if (typeof decoded === "string" || typeof decoded.uid !== "string" || !decoded.uid) {
        return next(new AppError("Invalid token", 401));
      }
      req.user = { uid: decoded.uid, iat: decoded.iat, exp: decoded.exp };
      next();
    } catch (e) {
      if (e instanceof jwt.TokenExpiredError) return next(new AppError("Token expired", 401));
      if (e instanceof jwt.JsonWebTokenError) return next(new AppError("Invalid token", 401));
      return next(new AppError("Authentication failed", 401));
    }
  };
}

export function traineeIdOf(req: AuthRequest): string {
  const uid = req.user?.uid;
  if (!uid) throw new AppError("Not authenticated", 401);
  return uid;
}
