import { z } from "zod";
import { APPLICATION_STATUSES } from "../models/Application";
import { objectId } from "./common";

export const createApplicationSchema = z.object({
  job_id: objectId,
  cover_letter: z.string().max(5000).optional(),
  resume_url: z.string().min(1).optional(),
});

export const updateStatusSchema = z.object({
  status: z.enum(APPLICATION_STATUSES),
  notes: z.string().optional(),
});

export const saveJobSchema = z.object({
  job_id: objectId,
});
