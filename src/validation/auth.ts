import { z } from "zod";
import { passwordProblem } from "../util/password";

export const registerSchema = z.object({
  email: z.string().trim().toLowerCase().email("Invalid email format"),
  password: z.string().superRefine((password, ctx) => {
    const problem = passwordProblem(password);
    if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
  }),
  full_name: z.string().trim().min(1, "Full name is required"),
  role: z.enum(["job_seeker", "employer"]).default("job_seeker"),
  mobile: z.string().regex(/^\d{10}$/, "Mobile number must be 10 digits").optional(),
});

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().min(1, "Email is required"),
  password: z.string().min(1, "Password is required"),
});

export const resendVerificationSchema = z.object({
  email: z.string().trim().toLowerCase().email("Invalid email format"),
});
