import express from "express";
import { Request, Response } from "express";
import Job from "../models/Job";
import authMiddleware, { currentUser, requireRole } from "../middleware/auth.middleware";
import { createJobSchema, jobSearchSchema, updateJobSchema } from "../validation/job";
import { buildJobSearchFilter } from "../util/jobQuery";
import { deleteJobCascade } from "../util/cascade";
import { isOwnerOrAdmin } from "../util/access";
import { HttpError } from "../util/HttpError";

const router = express.Router();

// public search over active postings
router.get("/", async (req: Request, res: Response) => {
    const { skip, limit, ...params } = jobSearchSchema.parse(req.query);
    const filter = buildJobSearchFilter(params);

    const [jobs, total] = await Promise.all([
        Job.find(filter).sort({ created_at: -1 }).skip(skip).limit(limit),
        Job.countDocuments(filter),
    ]);
    res.json({ jobs, total, skip, limit });
});

router.get("/mine", authMiddleware, requireRole("employer"), async (req: Request, res: Response) => {
    const jobs = await Job.find({ posted_by: currentUser(req)._id }).sort({ created_at: -1 });
    res.json(jobs);
});

router.get("/:id", async (req: Request, res: Response) => {
    const job = await Job.findOneAndUpdate(
        { _id: req.params.id, is_active: true },
        { $inc: { view_count: 1 } },
        { new: true },
    );
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    res.json(job);
});

router.post("/", authMiddleware, requireRole("employer"), async (req: Request, res: Response) => {
    const body = createJobSchema.parse(req.body);
    const job = await Job.create({ ...body, posted_by: currentUser(req)._id });
    res.status(201).json(job);
});

router.put("/:id", authMiddleware, requireRole("employer", "admin"), async (req: Request, res: Response) => {
    const updates = updateJobSchema.parse(req.body);
    const job = await Job.findById(req.params.id);
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    if (!isOwnerOrAdmin(job.posted_by, currentUser(req))) {
        throw new HttpError(403, "Not authorized to update this job");
    }
    job.set(updates);
    await job.save();
    res.json(job);
});

router.delete("/:id", authMiddleware, requireRole("employer", "admin"), async (req: Request, res: Response) => {
    const job = await Job.findById(req.params.id);
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    if (!isOwnerOrAdmin(job.posted_by, currentUser(req))) {
        throw new HttpError(403, "Not authorized to delete this job");
    }
    await deleteJobCascade(job._id);
    res.json({ message: "Job deleted successfully" });
});

export default router;
