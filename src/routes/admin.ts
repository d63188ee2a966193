import express from "express";
import { Request, Response } from "express";
import { z } from "zod";
import { FilterQuery } from "mongoose";
import User, { toPublicUser, USER_ROLES } from "../models/User";
import Job, { IJob } from "../models/Job";
import Application from "../models/Application";
import authMiddleware, { currentUser, requireRole } from "../middleware/auth.middleware";
import { deleteUserCascade } from "../util/cascade";
import { HttpError } from "../util/HttpError";
import { adminJobListSchema } from "../validation/job";

const router = express.Router();

router.use(authMiddleware, requireRole("admin"));

const activeFlagSchema = z.object({ is_active: z.boolean() });
const userListSchema = z.object({ role: z.enum(USER_ROLES).optional() });

router.get("/users", async (req: Request, res: Response) => {
    const { role } = userListSchema.parse(req.query);
    const users = await User.find(role ? { role } : {}).sort({ created_at: -1 });
    res.json({ users: users.map(toPublicUser), total: users.length });
});

router.get("/users/:id", async (req: Request, res: Response) => {
    const user = await User.findById(req.params.id);
    if (!user) {
        throw new HttpError(404, "User not found");
    }
    res.json(toPublicUser(user));
});

// Activate or deactivate an account
router.patch("/users/:id/status", async (req: Request, res: Response) => {
    const { is_active } = activeFlagSchema.parse(req.body);
    const user = await User.findById(req.params.id);
    if (!user) {
        throw new HttpError(404, "User not found");
    }
    if (user._id.equals(currentUser(req)._id) && !is_active) {
        throw new HttpError(400, "You cannot deactivate your own account");
    }
    user.is_active = is_active;
    await user.save();
    res.json(toPublicUser(user));
});

router.delete("/users/:id", async (req: Request, res: Response) => {
    const user = await User.findById(req.params.id);
    if (!user) {
        throw new HttpError(404, "User not found");
    }
    if (user._id.equals(currentUser(req)._id)) {
        throw new HttpError(400, "You cannot delete your own account");
    }
    await deleteUserCascade(user._id);
    res.json({ message: "User deleted successfully" });
});

// moderation of postings; inactive ones are listed too
router.get("/jobs", async (req: Request, res: Response) => {
    const { skip, limit, is_active } = adminJobListSchema.parse(req.query);
    const filter: FilterQuery<IJob> = is_active === undefined ? {} : { is_active };

    const [jobs, total] = await Promise.all([
        Job.find(filter, null, { sort: { created_at: -1 }, skip, limit }),
        Job.countDocuments(filter),
    ]);
    res.json({ jobs, total, skip, limit });
});

router.patch("/jobs/:id/status", async (req: Request, res: Response) => {
    const { is_active } = activeFlagSchema.parse(req.body);
    const job = await Job.findByIdAndUpdate(req.params.id, { is_active }, { new: true });
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    res.json(job);
});

router.get("/stats", async (req: Request, res: Response) => {
    const [roleRows, jobs, applications] = await Promise.all([
        User.aggregate<{ _id: string; count: number }>([{ $group: { _id: "$role", count: { $sum: 1 } } }]),
        Job.countDocuments(),
        Application.countDocuments(),
    ]);
    const users = { job_seeker: 0, employer: 0, admin: 0 };
    for (const row of roleRows) {
        if (row._id === "job_seeker" || row._id === "employer" || row._id === "admin") {
            users[row._id] = row.count;
        }
    }
    res.json({ users, jobs, applications });
});

export default router;
