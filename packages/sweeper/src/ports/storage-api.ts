import type { BucketName } from "../model/upload-record"

export interface BucketSummary {
  name?: string
  createdAt?: Date
}

export interface ListUploadSessionsInput {
  bucket: BucketName
  keyMarker?: string
  uploadIdMarker?: string

  /** Page size hint; the provider may return fewer. */
  maxUploads?: number
}

/** Fields the provider may leave out; callers skip incomplete sessions. */
export interface UploadSession {
  key?: string
  uploadId?: string
  initiated?: Date
  storageClass?: string
}

export interface UploadSessionPage {
  sessions: UploadSession[]
  isTruncated: boolean
  nextKeyMarker?: string
  nextUploadIdMarker?: string
}

export interface ListUploadPartsInput {
  bucket: BucketName
  key: string
  uploadId: string
  partNumberMarker?: string
}

export interface UploadPart {
  partNumber?: number
  size?: number
}

export interface UploadPartPage {
  parts: UploadPart[]
  isTruncated: boolean
  nextPartNumberMarker?: string
}

export interface UploadLocator {
  bucket: BucketName
  key: string
  uploadId: string
}

/**
 * The five provider calls the sweeper needs. Implementations either talk to
 * the provider directly or wrap another implementation.
 */
export interface MultipartStorageApi {
  listBuckets(signal?: AbortSignal): Promise<BucketSummary[]>

  /** Raw location constraint; empty or undefined for the provider's home region. */
  getBucketLocation(bucket: BucketName, signal?: AbortSignal): Promise<string | undefined>

  listUploadSessions(
    input: ListUploadSessionsInput,
    signal?: AbortSignal,
  ): Promise<UploadSessionPage>

  listUploadParts(input: ListUploadPartsInput, signal?: AbortSignal): Promise<UploadPartPage>

  abortUpload(upload: UploadLocator, signal?: AbortSignal): Promise<void>
}

export type StorageApiFactory = (
  region: string,
) => MultipartStorageApi | Promise<MultipartStorageApi>
