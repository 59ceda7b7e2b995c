/**
 * Durable key/value blob storage shared by every invocation of a run.
 */
export interface ObjectStore {
  put(key: string, body: string): Promise<void>;
  /** Writes only when the key is absent; true when this call created it. */
  putIfAbsent(key: string, body: string): Promise<boolean>;
  get(key: string): Promise<string | null>;
  /** Keys starting with `prefix`, sorted ascending. */
  list(prefix: string): Promise<string[]>;
  delete(key: string): Promise<void>;
}
