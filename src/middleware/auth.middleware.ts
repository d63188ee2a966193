import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import User, { UserDocument, UserRole } from "../models/User";
import { config } from "../config/env";
import { HttpError } from "../util/HttpError";

export const signToken = (user: UserDocument): string =>
  jwt.sign({ id: user._id.toString(), role: user.role }, config.jwtSecret, { expiresIn: config.jwtExpiresIn });

const extractToken = (req: Request): string | undefined => {
  const authHeader = req.headers["x-access-token"] || req.headers["authorization"];
  if (Array.isArray(authHeader)) {
    return authHeader[0];
  }
  if (typeof authHeader === "string") {
    return authHeader.startsWith("Bearer ") ? authHeader.split(" ")[1] : authHeader;
  }
  return undefined;
};

const authMiddleware = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  const token = extractToken(req);
  if (!token) {
    res.status(401).json({ message: "Access denied. No token provided." });
    return;
  }

  let userId: string;
  try {
    const decoded = jwt.verify(token, config.jwtSecret);
    if (typeof decoded === "string" || typeof decoded.id !== "string") {
      res.status(400).json({ message: "Invalid token. Access denied." });
      return;
    }
    userId = decoded.id;
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      res.status(401).json({ message: "Session expired. Please log in again." });
    } else if (err instanceof jwt.JsonWebTokenError) {
      res.status(400).json({ message: "Invalid token. Access denied." });
    } else {
      next(err);
    }
    return;
  }

  const user = await User.findById(userId);
  if (!user) {
    res.status(404).json({ message: "User not found." });
    return;
  }
  if (!user.is_active) {
    res.status(403).json({ message: "Account is deactivated." });
    return;
  }

  req.user = user;
  req.token = token;
  next();
};

export const requireRole = (...roles: UserRole[]) =>
  (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user || !roles.includes(req.user.role)) {
      res.status(403).json({ message: "You are not allowed to perform this action." });
      return;
    }
    next();
  };

// for handlers mounted behind authMiddleware
export const currentUser = (req: Request): UserDocument => {
  if (!req.user) {
    throw new HttpError(401, "Access denied. No token provided.");
  }
  return req.user;
};

export default authMiddleware;
