import express from "express";
import { Request, Response } from "express";
import { z } from "zod";
import { FilterQuery } from "mongoose";
import Job from "../models/Job";
import Application, { APPLICATION_STATUSES, IApplication } from "../models/Application";
import User from "../models/User";
import authMiddleware, { currentUser, requireRole } from "../middleware/auth.middleware";
import { tallyStatuses } from "../util/applicationStatus";

const router = express.Router();

router.use(authMiddleware, requireRole("employer"));

const applicationListSchema = z.object({ status: z.enum(APPLICATION_STATUSES).optional() });

router.get("/stats", async (req: Request, res: Response) => {
    const jobs = await Job.find({ posted_by: currentUser(req)._id }, "is_active");
    const jobIds = jobs.map((job) => job._id);

    const rows = await Application.aggregate<{ _id: string; count: number }>([
        { $match: { job_id: { $in: jobIds } } },
        { $group: { _id: "$status", count: { $sum: 1 } } },
    ]);
    const byStatus = tallyStatuses(rows);

    res.json({
        totalJobs: jobs.length,
        activeJobs: jobs.filter((job) => job.is_active).length,
        totalApplications: Object.values(byStatus).reduce((sum, count) => sum + count, 0),
        byStatus,
    });
});

// every application across the caller's postings, newest first
router.get("/applications", async (req: Request, res: Response) => {
    const { status } = applicationListSchema.parse(req.query);
    const jobs = await Job.find({ posted_by: currentUser(req)._id }, "title company");
    const jobsById = new Map(jobs.map((job) => [job._id.toString(), job]));

    const filter: FilterQuery<IApplication> = { job_id: { $in: jobs.map((job) => job._id) } };
    if (status) {
        filter.status = status;
    }
    const applications = await Application.find(filter, null, { sort: { created_at: -1 } });
    const applicantIds = [...new Set(applications.map((application) => application.user_id.toString()))];
    const applicants = await User.find({ _id: { $in: applicantIds } }, "full_name email");
    const applicantsById = new Map(applicants.map((user) => [user._id.toString(), user]));

    res.json(applications.map((application) => {
        const job = jobsById.get(application.job_id.toString());
        const applicant = applicantsById.get(application.user_id.toString());
        return {
            id: application._id,
            job_id: application.job_id,
            job_title: job?.title,
            company: job?.company,
            user_id: application.user_id,
            applicant_name: applicant?.full_name,
            applicant_email: applicant?.email,
            status: application.status,
            cover_letter: application.cover_letter,
            resume_url: application.resume_url,
            viewed_at: application.viewed_at,
            created_at: application.created_at,
        };
    }));
});

export default router;
