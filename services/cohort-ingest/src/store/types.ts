export type ObjectMetadata = Record<string, string>;

export type ObjectHead = {
  key: string;
  sizeBytes: number | null;
  contentType: string | null;
  metadata: ObjectMetadata;
};

export type PutObjectOptions = {
  contentType?: string;
  metadata?: ObjectMetadata;
};

export interface ObjectStore {
  list(prefix: string): Promise<string[]>;
  head(key: string): Promise<ObjectHead>;
  get(key: string): Promise<Buffer>;
  put(key: string, body: Buffer, options?: PutObjectOptions): Promise<void>;
}

export class ObjectNotFoundError extends Error {
  public readonly key: string;

  constructor(key: string) {
    super(`Object not found: ${key}`);
    this.name = 'ObjectNotFoundError';
    this.key = key;
  }
}
