import * as fs from "fs";
import * as os from "os";
import * as path from "path";

/**
 * Run `work` inside a fresh private temp directory. The directory and
 * everything written to it are removed when `work` settles, whether it
 * resolved or threw.
 */
export async function withTempDir<T>(work: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "image-narrator-"));
  try {
    return await work(dir);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}
