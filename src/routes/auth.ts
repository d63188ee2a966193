import express from "express";
import { Request, Response } from "express";
import User, { toPublicUser } from "../models/User";
import Token from "../models/Token";
import { deliverVerification } from "../util/verification";
import authMiddleware, { currentUser, signToken } from "../middleware/auth.middleware";
import { loginSchema, registerSchema, resendVerificationSchema } from "../validation/auth";
import { hashPassword, verifyPassword } from "../util/password";
import { HttpError } from "../util/HttpError";

const router = express.Router();

//user registration
router.post('/register', async (req: Request, res: Response) => {
    const { email, password, full_name, role, mobile } = registerSchema.parse(req.body);

    const existingEmail = await User.findOne({ email });
    if (existingEmail) {
        throw new HttpError(409, "A user with this email already exists.");
    }

    const newUser = await User.insertOne({
        email,
        full_name,
        role,
        mobile,
        hashed_password: await hashPassword(password),
    });

    // the account exists either way; the user can ask for a new link later
    const mailSent = await deliverVerification(newUser);

    res.status(201).json({
        message: mailSent
            ? "Registration successful. Please verify your email."
            : "Registration successful, but the verification email could not be sent. Please request a new verification link.",
        email_sent: mailSent,
        user: toPublicUser(newUser),
    });
});

router.get('/verify-email', async (req: Request, res: Response) => {
    const { token } = req.query;
    if (typeof token !== "string" || !token) {
        throw new HttpError(400, "Verification token is required.");
    }
    const record = await Token.findOne({ token });
    if (!record) {
        throw new HttpError(400, "Invalid or expired verification link.");
    }
    await User.updateOne({ _id: record.user_id }, { is_verified: true });
    await Token.deleteOne({ _id: record._id });
    res.json({ message: "Email verified successfully. You can now log in." });
});

router.post('/resend-verification', async (req: Request, res: Response) => {
    const { email } = resendVerificationSchema.parse(req.body);

    const user = await User.findOne({ email });
    if (!user) {
        throw new HttpError(404, "No account found for this email.");
    }
    if (user.is_verified) {
        throw new HttpError(400, "Email is already verified.");
    }
    if (!(await deliverVerification(user))) {
        throw new HttpError(502, "Could not send the verification email. Please try again later.");
    }
    res.json({ message: "A new verification link has been sent." });
});

//user login
router.post('/login', async (req: Request, res: Response) => {
    const { email, password } = loginSchema.parse(req.body);

    const user = await User.findOne({ email });
    // same answer for unknown email and wrong password
    if (!user || !(await verifyPassword(password, user.hashed_password))) {
        throw new HttpError(401, "Invalid email or password");
    }
    if (!user.is_verified) {
        throw new HttpError(403, "Please verify your email address before logging in.");
    }
    if (!user.is_active) {
        throw new HttpError(403, "Account is deactivated.");
    }

    res.json({
        token: signToken(user),
        user: toPublicUser(user),
    });
});

router.get('/me', authMiddleware, async (req: Request, res: Response) => {
    res.json(toPublicUser(currentUser(req)));
});

export default router;
