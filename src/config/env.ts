import dotenv from "dotenv";
dotenv.config();

const toNumber = (value: string | undefined, fallback: number): number => {
    const parsed = Number(value);
    return value && Number.isFinite(parsed) ? parsed : fallback;
};

const toList = (value: string | undefined): string[] =>
    (value ?? "").split(",").map((item) => item.trim()).filter(Boolean);

export const config = {
    port: toNumber(process.env.PORT, 8050),
    mongoUri: process.env.MONGO_URI,
    jwtSecret: process.env.JWT_PRIVATE_KEY ?? "",
    // seconds
    jwtExpiresIn: toNumber(process.env.JWT_EXPIRES_IN, 60 * 60 * 24),
    saltRounds: toNumber(process.env.SALT, 10),
    clientUrl: process.env.CLIENT_URL ?? "http://localhost:5173",
    corsOrigins: toList(process.env.CORS_ORIGINS ?? "http://localhost:5173"),
    admin: {
        email: process.env.ADMIN_EMAIL ?? "admin@example.com",
        password: process.env.ADMIN_PASSWORD,
    },
    mail: {
        host: process.env.EMAIL_HOST,
        port: toNumber(process.env.EMAIL_PORT, 587),
        user: process.env.EMAIL_USER,
        pass: process.env.EMAIL_PASS,
        secure: process.env.EMAIL_SECURE === "true",
    },
    s3: {
        accessKeyId: process.env.AWS_ACCESS_KEY_ID,
        secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
        region: process.env.AWS_REGION,
        bucketName: process.env.AWS_BUCKET_NAME,
    },
};
