import { FilterQuery } from "mongoose";
import { IJob, JobType, WorkMode } from "../models/Job";

export interface JobSearchParams {
    search?: string;
    location?: string;
    work_mode?: WorkMode;
    job_type?: JobType;
    salary_min?: number;
    experience_min?: number;
    experience_max?: number;
    skills?: string;
}

export const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const splitList = (value: string | undefined): string[] =>
    (value ?? "").split(",").map((item) => item.trim()).filter(Boolean);

// only active postings are ever searchable
export const buildJobSearchFilter = (params: JobSearchParams): FilterQuery<IJob> => {
    const filter: FilterQuery<IJob> = { is_active: true };

    if (params.search) {
        const pattern = escapeRegex(params.search);
        filter.$or = [
            { title: { $regex: pattern, $options: "i" } },
            { description: { $regex: pattern, $options: "i" } },
            { skills: params.search },
        ];
    }
    if (params.location) {
        filter.location = { $regex: escapeRegex(params.location), $options: "i" };
    }
    if (params.work_mode) {
        filter.work_mode = params.work_mode;
    }
    if (params.job_type) {
        filter.job_type = params.job_type;
    }
    if (params.salary_min != null && params.salary_min > 0) {
        filter.salary_min = { $gte: params.salary_min };
    }
    if (params.experience_min != null || params.experience_max != null) {
        const range: { $gte?: number; $lte?: number } = {};
        if (params.experience_min != null) range.$gte = params.experience_min;
        if (params.experience_max != null) range.$lte = params.experience_max;
        filter.experience_required = range;
    }
    const skills = splitList(params.skills);
    if (skills.length > 0) {
        filter.skills = { $in: skills };
    }
    return filter;
};
