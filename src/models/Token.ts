import mongoose, { Schema, Types } from "mongoose";

export interface IToken {
    user_id: Types.ObjectId;
    token: string;
    created_at: Date;
}

const tokenSchema = new mongoose.Schema<IToken>({
    user_id: {
        type: Schema.Types.ObjectId,
        ref: "User",
        unique: true,
        required: true
    },
    token: {
        required: true,
        type: String
    },
    // verification links stop working after a day
    created_at: {
        type: Date,
        default: Date.now,
        expires: 60 * 60 * 24
    }
});

export default mongoose.model<IToken>("Token", tokenSchema);
