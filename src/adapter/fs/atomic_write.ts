import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

/** Readers of `targetPath` see either the previous bytes or all of `data`. */
export async function writeFileAtomically(targetPath: string, data: Uint8Array): Promise<void> {
  const dir = path.dirname(targetPath);
  const tempPath = path.join(dir, `.${path.basename(targetPath)}.${randomUUID()}.tmp`);
  await fs.mkdir(dir, { recursive: true });

  try {
    const handle = await fs.open(tempPath, "wx", 0o644);
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
