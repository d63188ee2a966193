import { Types } from "mongoose";
import { UserDocument } from "../models/User";

export const isOwnerOrAdmin = (ownerId: Types.ObjectId, user: UserDocument): boolean =>
    user.role === "admin" || ownerId.equals(user._id);
