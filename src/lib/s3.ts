import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";

const s3Client = new S3Client({});

export async function getObjectBuffer(bucket: string, key: string): Promise<Uint8Array> {
  const response = await s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
  if (!response.Body) {
    throw new Error("OBJECT_BODY_EMPTY");
  }
  return await response.Body.transformToByteArray();
}

export interface PutObjectRequest {
  bucket: string;
  key: string;
  body: string;
  contentType: string;
}

export async function putObject(request: PutObjectRequest): Promise<void> {
  await s3Client.send(
    new PutObjectCommand({
      Bucket: request.bucket,
      Key: request.key,
      Body: request.body,
      ContentType: request.contentType,
    })
  );
}

export { s3Client };
