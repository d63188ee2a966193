import { Request, Response, NextFunction } from "express";
import mongoose from "mongoose";
import multer from "multer";
import { ZodError } from "zod";
import { HttpError } from "../util/HttpError";

const formatZodError = (error: ZodError) =>
  error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));

const isDuplicateKeyError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === 11000;

export const notFound = (req: Request, res: Response): void => {
  res.status(404).json({ message: "Route not found" });
};

// Express recognises error middleware by its four parameters
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof HttpError) {
    res.status(err.status).json({ message: err.message });
    return;
  }
  if (err instanceof ZodError) {
    res.status(400).json({ message: "Validation failed", errors: formatZodError(err) });
    return;
  }
  if (err instanceof mongoose.Error.ValidationError) {
    const errors = Object.values(err.errors).map((e) => ({ path: e.path, message: e.message }));
    res.status(400).json({ message: "Validation failed", errors });
    return;
  }
  if (err instanceof mongoose.Error.CastError) {
    res.status(400).json({ message: `Invalid ${err.path}` });
    return;
  }
  if (isDuplicateKeyError(err)) {
    res.status(409).json({ message: "Record already exists" });
    return;
  }
  if (err instanceof multer.MulterError) {
    res.status(400).json({ message: err.message });
    return;
  }
  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({ message: "Internal Server Error" });
};
