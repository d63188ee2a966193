import crypto from "crypto";
import { Types } from "mongoose";
import Token from "../models/Token";
import { UserDocument } from "../models/User";
import { sendConfirmationMail } from "./SendMail";

// one live token per user; issuing again replaces it and restarts the 24h window
export const issueVerificationToken = async (userId: Types.ObjectId): Promise<string> => {
    const token = crypto.randomBytes(20).toString("hex");
    await Token.findOneAndUpdate(
        { user_id: userId },
        { token, created_at: new Date() },
        { upsert: true },
    );
    return token;
};

// resolves false when the mail could not be sent; the token is stored either way
export const deliverVerification = async (user: UserDocument): Promise<boolean> => {
    const token = await issueVerificationToken(user._id);
    try {
        await sendConfirmationMail({ userEmail: user.email, userName: user.full_name, token });
        return true;
    } catch (error) {
        console.error(`Failed to send confirmation mail to ${user.email}`, error);
        return false;
    }
};
