import crypto from "node:crypto";
import fs from "node:fs";

export async function writeFileAtomic(targetPath: string, content: string): Promise<void> {
  const tempPath = `${targetPath}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.part`;
  try {
    await fs.promises.writeFile(tempPath, content, { encoding: "utf-8", flag: "wx" });
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}
