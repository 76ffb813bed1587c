import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import { ObjectRef, ObjectStore } from '../types';

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly s3Client: S3Client) {}

  async put(ref: ObjectRef, body: Uint8Array, contentType: string): Promise<void> {
    const command = new PutObjectCommand({
      Bucket: ref.bucketName,
      Key: ref.objectKey,
      Body: body,
      ContentType: contentType,
    });
    await this.s3Client.send(command);
  }
}
