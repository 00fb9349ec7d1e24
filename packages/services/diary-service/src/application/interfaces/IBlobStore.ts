/**
 * Flat key/bytes store for image payloads. Keys are bare file names such as `12.png`.
 */
export interface IBlobStore {
  ensureReady(): Promise<void>;
  write(key: string, data: Buffer): Promise<void>;
  read(key: string): Promise<Buffer | null>;
  exists(key: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  /** First `{id}{extension}` key that exists, in the order given */
  findByProbe(id: number, extensions: readonly string[]): Promise<string | null>;
}
