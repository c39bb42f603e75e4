export type CacheSetOptions = {
  ex?: number;
};

export interface CacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;
}
