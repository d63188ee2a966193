import { APPLICATION_STATUSES, ApplicationStatus } from "../models/Application";

const PIPELINE: readonly ApplicationStatus[] = ["applied", "reviewed", "interview", "offered", "accepted"];

export const isTerminalStatus = (status: ApplicationStatus): boolean =>
    status === "accepted" || status === "rejected";

/**
 * An application only moves forward through the pipeline (stages may be skipped)
 * and can be rejected from any stage until it is accepted.
 */
export const canTransition = (from: ApplicationStatus, to: ApplicationStatus): boolean => {
    if (from === to || isTerminalStatus(from)) {
        return false;
    }
    if (to === "rejected") {
        return true;
    }
    return PIPELINE.indexOf(to) > PIPELINE.indexOf(from);
};

export const isApplicationStatus = (value: unknown): value is ApplicationStatus =>
    APPLICATION_STATUSES.some((status) => status === value);

// turns { _id: status, count } aggregation rows into a count for every status
export const tallyStatuses = (rows: Array<{ _id: unknown; count: number }>): Record<ApplicationStatus, number> => {
    const tally: Record<ApplicationStatus, number> = {
        applied: 0, reviewed: 0, interview: 0, offered: 0, accepted: 0, rejected: 0,
    };
    for (const row of rows) {
        if (isApplicationStatus(row._id)) {
            tally[row._id] += row.count;
        }
    }
    return tally;
};
