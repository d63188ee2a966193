import { IJobSeekerProfile } from "../models/JobSeekerProfile";

export type CompletionInput = Partial<Pick<IJobSeekerProfile,
    "phone" | "skills" | "experience_years" | "education" | "employment_history" | "preferred_locations" | "resume_url" | "personal_details">>;

const filled = (value: string | undefined): boolean => Boolean(value && value.trim());

// weights add up to 100
const SECTIONS: Array<[weight: number, isComplete: (profile: CompletionInput) => boolean]> = [
    [10, (p) => filled(p.phone)],
    [20, (p) => (p.skills?.length ?? 0) > 0],
    [10, (p) => p.experience_years != null],
    [15, (p) => (p.education?.length ?? 0) > 0],
    [15, (p) => (p.employment_history?.length ?? 0) > 0],
    [10, (p) => (p.preferred_locations?.length ?? 0) > 0],
    [15, (p) => filled(p.resume_url)],
    [5, (p) => filled(p.personal_details?.resume_headline)],
];

export const computeProfileCompletion = (profile: CompletionInput): number => {
    const earned = SECTIONS.reduce((total, [weight, isComplete]) => total + (isComplete(profile) ? weight : 0), 0);
    return Math.min(100, Math.max(0, Math.round(earned)));
};
