import { z } from "zod";
import { JOB_TYPES, WORK_MODES } from "../models/Job";
import { pagination } from "./common";

const jobFields = {
  title: z.string().trim().min(1),
  description: z.string().min(1),
  company: z.string().trim().min(1),
  location: z.string().trim().min(1),
  salary_min: z.number().int().min(0).optional(),
  salary_max: z.number().int().min(0).optional(),
  skills: z.array(z.string().trim().min(1)).default([]),
  experience_required: z.number().min(0).optional(),
  work_mode: z.enum(WORK_MODES).optional(),
  job_type: z.enum(JOB_TYPES).default("full_time"),
  company_logo_url: z.string().url().optional(),
};

const salaryOrder = (job: { salary_min?: number; salary_max?: number }) =>
  job.salary_min == null || job.salary_max == null || job.salary_max >= job.salary_min;
const salaryIssue = { message: "salary_max must not be lower than salary_min", path: ["salary_max"] };

export const createJobSchema = z.object(jobFields).refine(salaryOrder, salaryIssue);

// defaults must not reset fields the caller left out;
// is_active belongs to admin moderation and is rejected here
export const updateJobSchema = z.object({
  ...jobFields,
  skills: z.array(z.string().trim().min(1)),
  job_type: z.enum(JOB_TYPES),
}).partial().strict().refine(salaryOrder, salaryIssue);

export const jobSearchSchema = pagination.extend({
  search: z.string().trim().optional(),
  location: z.string().trim().optional(),
  work_mode: z.enum(WORK_MODES).optional(),
  job_type: z.enum(JOB_TYPES).optional(),
  salary_min: z.coerce.number().min(0).optional(),
  experience_min: z.coerce.number().min(0).optional(),
  experience_max: z.coerce.number().min(0).optional(),
  skills: z.string().optional(),
});

export const adminJobListSchema = pagination.extend({
  is_active: z.enum(["true", "false"]).transform((value) => value === "true").optional(),
});
