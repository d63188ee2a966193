import { z } from "zod";

const skill = z.object({
  name: z.string().trim().min(1),
  version: z.string().optional(),
  experience_months: z.number().int().min(0).optional(),
});

const education = z.object({
  institution: z.string().min(1),
  degree: z.string().min(1),
  field_of_study: z.string().min(1),
  start_date: z.coerce.date(),
  end_date: z.coerce.date().optional(),
  grade: z.string().optional(),
  description: z.string().optional(),
});

const employment = z.object({
  company: z.string().min(1),
  designation: z.string().min(1),
  start_date: z.coerce.date(),
  end_date: z.coerce.date().optional(),
  is_current: z.boolean().default(false),
  description: z.string().optional(),
});

const project = z.object({
  title: z.string().min(1),
  description: z.string().optional(),
  url: z.string().url().optional(),
});

const personalDetails = z.object({
  dob: z.coerce.date().optional(),
  gender: z.string().optional(),
  current_location: z.string().optional(),
  languages: z.array(z.string()).default([]),
  resume_headline: z.string().optional(),
});

// profile_completion_pct is derived, never accepted from the client
export const jobSeekerProfileSchema = z.object({
  phone: z.string().optional(),
  skills: z.array(skill).optional(),
  experience_years: z.number().int().min(0).optional(),
  education: z.array(education).optional(),
  employment_history: z.array(employment).optional(),
  projects: z.array(project).optional(),
  personal_details: personalDetails.optional(),
  social_links: z.record(z.string(), z.string().url()).optional(),
  preferred_locations: z.array(z.string().trim().min(1)).optional(),
  resume_url: z.string().min(1).optional(),
}).strict();

export const recruiterProfileSchema = z.object({
  company_name: z.string().trim().min(1).optional(),
  designation: z.string().trim().optional(),
  company_website: z.string().url().optional(),
  industry: z.string().trim().optional(),
}).strict();

export const candidateSearchSchema = z.object({
  skills: z.string().optional(),
  experience_min: z.coerce.number().min(0).optional(),
  location: z.string().trim().optional(),
});
