import { S3Client, PutObjectCommand, GetObjectCommand, DeleteObjectCommand } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import crypto from "crypto";
import { config } from "../config/env";

let s3: S3Client | undefined;

const bucket = (): { client: S3Client; bucketName: string } => {
    const { accessKeyId, secretAccessKey, region, bucketName } = config.s3;
    if (!accessKeyId || !secretAccessKey || !region || !bucketName) {
        throw new Error("all S3 credentials are required")
    }
    s3 ??= new S3Client({
        credentials: {
            accessKeyId,
            secretAccessKey
        },
        region
    });
    return { client: s3, bucketName };
};

export const randomFileName = (bytes = 32) => crypto.randomBytes(bytes).toString("hex");

// stores the file under a random key and returns that key
export async function uploadFile(file: Express.Multer.File): Promise<string> {
    const { client, bucketName } = bucket();
    const key = randomFileName();
    await client.send(new PutObjectCommand({
        Bucket: bucketName,
        Key: key,
        Body: file.buffer,
        ContentType: file.mimetype,
    }));
    return key;
}

export async function deleteFile(key: string): Promise<void> {
    const { client, bucketName } = bucket();
    await client.send(new DeleteObjectCommand({ Bucket: bucketName, Key: key }));
}

export async function generateSignedUrl(key?: string | null): Promise<string> {
    if (!key) {
        throw new Error("Invalid file key provided")
    }
    const { client, bucketName } = bucket();
    const command = new GetObjectCommand({
        Bucket: bucketName,
        Key: key,
    });
    return getSignedUrl(client, command, { expiresIn: 3600 });
}
