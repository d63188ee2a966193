import { Types } from "mongoose";
import Application from "../models/Application";
import Job from "../models/Job";
import JobSeekerProfile from "../models/JobSeekerProfile";
import RecruiterProfile from "../models/RecruiterProfile";
import SavedJob from "../models/SavedJob";
import Token from "../models/Token";
import User from "../models/User";

type Id = Types.ObjectId | string;

// removing a job must not leave applications or bookmarks pointing at it
export async function deleteJobCascade(jobId: Id): Promise<void> {
    await Promise.all([
        Application.deleteMany({ job_id: jobId }),
        SavedJob.deleteMany({ job_id: jobId }),
    ]);
    await Job.deleteOne({ _id: jobId });
}

export async function deleteUserCascade(userId: Id): Promise<void> {
    const postedJobs = await Job.find({ posted_by: userId }, "_id");
    const jobIds = postedJobs.map((job) => job._id);

    // applications the user made count against other employers' jobs
    const ownApplications = await Application.find({ user_id: userId }, "job_id");
    await Promise.all(ownApplications.map((application) =>
        Job.updateOne(
            { _id: application.job_id, application_count: { $gt: 0 } },
            { $inc: { application_count: -1 } },
        )));

    await Promise.all([
        Application.deleteMany({ $or: [{ user_id: userId }, { job_id: { $in: jobIds } }] }),
        SavedJob.deleteMany({ $or: [{ user_id: userId }, { job_id: { $in: jobIds } }] }),
        JobSeekerProfile.deleteOne({ user_id: userId }),
        RecruiterProfile.deleteOne({ user_id: userId }),
        Token.deleteMany({ user_id: userId }),
        Job.deleteMany({ posted_by: userId }),
    ]);
    await User.deleteOne({ _id: userId });
}
