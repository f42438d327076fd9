import { statfs } from "fs/promises";

/** Reports how many bytes a directory's filesystem can still take. */
export interface StorageProbe {
  freeBytes(dir: string): Promise<number>;
}

export const fsStorageProbe: StorageProbe = {
  async freeBytes(dir: string): Promise<number> {
    const stats = await statfs(dir);
    return stats.bavail * stats.bsize;
  },
};
