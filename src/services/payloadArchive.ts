import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { recordCollaboratorError, startCollaboratorTimer } from "../metrics";

/** Storage for raw fetched payloads, kept for diagnosing classifier verdicts. */
export interface PayloadArchive {
  put(key: string, body: string, contentType: string): Promise<string>;
}

export interface MinioArchiveOptions {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  useSSL: boolean;
}

export class MinioPayloadArchive implements PayloadArchive {
  private readonly endpointUrl: URL;

  constructor(
    private readonly options: MinioArchiveOptions,
    private readonly client: S3Client = new S3Client({
      region: "us-east-1",
      endpoint: options.endpoint,
      forcePathStyle: true,
      credentials: {
        accessKeyId: options.accessKey,
        secretAccessKey: options.secretKey,
      },
    }),
  ) {
    this.endpointUrl = new URL(options.endpoint);
  }

  async put(key: string, body: string, contentType: string) {
    const stopTimer = startCollaboratorTimer("minio");
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.options.bucket,
          Key: key,
          Body: Buffer.from(body),
          ContentType: contentType || "application/octet-stream",
        }),
      );
    } catch (error) {
      recordCollaboratorError("minio", "upload");
      throw error;
    } finally {
      stopTimer();
    }
    const protocol = this.options.useSSL ? "https" : "http";
    return `${protocol}://${this.endpointUrl.host}/${this.options.bucket}/${key}`;
  }
}

export function archiveKey(taskId: string, jobId: string, attemptNumber: number) {
  return `raw/${taskId}/${jobId}/${String(attemptNumber).padStart(3, "0")}.html`;
}
