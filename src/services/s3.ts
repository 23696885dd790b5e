import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { readFile } from "fs/promises";

let s3ClientInstance: S3Client | null = null;

function s3Client(): S3Client {
  if (!s3ClientInstance) {
    s3ClientInstance = new S3Client({
      endpoint: process.env.S3_ENDPOINT,
      region: process.env.S3_REGION || "auto",
      credentials:
        process.env.S3_ACCESS_KEY_ID && process.env.S3_SECRET_ACCESS_KEY
          ? {
              accessKeyId: process.env.S3_ACCESS_KEY_ID,
              secretAccessKey: process.env.S3_SECRET_ACCESS_KEY,
            }
          : undefined,
    });
  }
  return s3ClientInstance;
}

export function isUploadEnabled(): boolean {
  return Boolean(process.env.S3_BUCKET);
}

export function getS3Url(bucket: string, key: string): string {
  if (process.env.S3_ENDPOINT) {
    return `${process.env.S3_ENDPOINT}/${bucket}/${key}`;
  }
  return `https://${bucket}.s3.${process.env.S3_REGION}.amazonaws.com/${key}`;
}

export async function uploadFile(
  key: string,
  filePath: string,
  contentType: string
): Promise<string> {
  const bucket = process.env.S3_BUCKET;
  if (!bucket) {
    throw new Error("S3_BUCKET is not set");
  }
  const fileContent = await readFile(filePath);

  await s3Client().send(
    new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: fileContent,
      ContentType: contentType,
      ContentDisposition: "inline",
    })
  );

  return getS3Url(bucket, key);
}
