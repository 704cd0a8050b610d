import { createHash } from 'crypto';
import fs from 'fs';

/**
 * SHA-256 of the whole file, lowercase hex. Streams the file so large
 * artifacts are not buffered in memory.
 */
export async function computeSha256(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
