import {
  AbortMultipartUploadCommand,
  GetBucketLocationCommand,
  ListBucketsCommand,
  ListMultipartUploadsCommand,
  ListPartsCommand,
  S3Client,
  type S3ClientConfig,
} from "@aws-sdk/client-s3"
import type {
  BucketSummary,
  ListUploadPartsInput,
  ListUploadSessionsInput,
  MultipartStorageApi,
  UploadLocator,
  UploadPartPage,
  UploadSessionPage,
} from "../../ports/storage-api"

export interface S3StorageApiDeps {
  client: S3Client
}

/**
 * MultipartStorageApi over the AWS SDK. Provider errors pass through
 * untouched; classification and retries happen in the wrapping client.
 */
export class S3StorageApi implements MultipartStorageApi {
  constructor(readonly deps: S3StorageApiDeps) {}

  async listBuckets(signal?: AbortSignal): Promise<BucketSummary[]> {
    const buckets: BucketSummary[] = []
    let continuationToken: string | undefined

    do {
      const response = await this.deps.client.send(
        new ListBucketsCommand({
          ...(continuationToken && { ContinuationToken: continuationToken }),
        }),
        { abortSignal: signal },
      )

      for (const bucket of response.Buckets ?? []) {
        buckets.push({
          ...(bucket.Name && { name: bucket.Name }),
          ...(bucket.CreationDate && { createdAt: bucket.CreationDate }),
        })
      }

      continuationToken = response.ContinuationToken
    } while (continuationToken)

    return buckets
  }

  async getBucketLocation(bucket: string, signal?: AbortSignal): Promise<string | undefined> {
    const response = await this.deps.client.send(
      new GetBucketLocationCommand({ Bucket: bucket }),
      { abortSignal: signal },
    )

    return response.LocationConstraint
  }

  async listUploadSessions(
    input: ListUploadSessionsInput,
    signal?: AbortSignal,
  ): Promise<UploadSessionPage> {
    const response = await this.deps.client.send(
      new ListMultipartUploadsCommand({
        Bucket: input.bucket,
        ...(input.keyMarker !== undefined && { KeyMarker: input.keyMarker }),
        ...(input.uploadIdMarker !== undefined && { UploadIdMarker: input.uploadIdMarker }),
        ...(input.maxUploads !== undefined && { MaxUploads: input.maxUploads }),
      }),
      { abortSignal: signal },
    )

    return {
      sessions: (response.Uploads ?? []).map((upload) => ({
        ...(upload.Key !== undefined && { key: upload.Key }),
        ...(upload.UploadId !== undefined && { uploadId: upload.UploadId }),
        ...(upload.Initiated !== undefined && { initiated: upload.Initiated }),
        ...(upload.StorageClass !== undefined && { storageClass: upload.StorageClass }),
      })),
      isTruncated: response.IsTruncated ?? false,
      ...(response.NextKeyMarker !== undefined && { nextKeyMarker: response.NextKeyMarker }),
      ...(response.NextUploadIdMarker !== undefined && {
        nextUploadIdMarker: response.NextUploadIdMarker,
      }),
    }
  }

  async listUploadParts(input: ListUploadPartsInput, signal?: AbortSignal): Promise<UploadPartPage> {
    const response = await this.deps.client.send(
      new ListPartsCommand({
        Bucket: input.bucket,
        Key: input.key,
        UploadId: input.uploadId,
        ...(input.partNumberMarker !== undefined && { PartNumberMarker: input.partNumberMarker }),
      }),
      { abortSignal: signal },
    )

    return {
      parts: (response.Parts ?? []).map((part) => ({
        ...(part.PartNumber !== undefined && { partNumber: part.PartNumber }),
        ...(part.Size !== undefined && { size: part.Size }),
      })),
      isTruncated: response.IsTruncated ?? false,
      ...(response.NextPartNumberMarker !== undefined && {
        nextPartNumberMarker: response.NextPartNumberMarker,
      }),
    }
  }

  async abortUpload(upload: UploadLocator, signal?: AbortSignal): Promise<void> {
    await this.deps.client.send(
      new AbortMultipartUploadCommand({
        Bucket: upload.bucket,
        Key: upload.key,
        UploadId: upload.uploadId,
      }),
      { abortSignal: signal },
    )
  }
}

export interface CreateS3ClientOptions {
  region: string
  profile?: string
  credentials?: S3ClientConfig["credentials"]
}

/** Region-pinned client. SDK retries are off; RetryingStorageApi owns them. */
export function createS3Client(options: CreateS3ClientOptions): S3Client {
  return new S3Client({
    region: options.region,
    maxAttempts: 1,
    ...(options.profile && { profile: options.profile }),
    ...(options.credentials && { credentials: options.credentials }),
  })
}
