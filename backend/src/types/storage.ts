export type ObjectMetadata = Record<string, string>;

export interface UploadUrlRequest {
  /** Object key; a random one under `uploads/` is generated when empty. */
  key?: string | null;
  metadata?: ObjectMetadata | null;
}

export interface UploadUrlResponse {
  url: string;
  method: 'PUT';
  key: string;
  metadata: ObjectMetadata | null;
  expires_in: number;
  public_url: string;
}

export interface StorageClient {
  getUploadUrl(key: string, metadata?: ObjectMetadata | null): Promise<UploadUrlResponse>;
  deleteFile(key: string): Promise<boolean>;
}
