import crypto from "crypto";
import fs from "fs/promises";
import { FrameIOError } from "../errors";

/** SHA-256 of the file's exact bytes, lowercase hex. */
export async function digestFile(filePath: string): Promise<string> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (err) {
    throw new FrameIOError(filePath, "read", { cause: err });
  }
  return crypto.createHash("sha256").update(data).digest("hex");
}
