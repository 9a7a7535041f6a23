import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { StoragePort } from "../../ports/sys/StoragePort";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** One file per key under `directory`; keys are URI-encoded into file names. */
export class FileStorage implements StoragePort {
  constructor(private readonly directory: string) {}

  async write(key: string, value: string): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(key), value, { encoding: "utf-8", mode: 0o600 });
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  private pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.json`);
  }
}
