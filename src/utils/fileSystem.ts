/**
 * 파일 시스템 헬퍼
 *
 * writeFileAtomic: 임시 파일 → rename
 *
 * 같은 디렉토리에 임시 파일을 만든 뒤 rename 하므로
 * 읽는 쪽은 이전 내용 또는 새 내용 중 하나만 보게 됨
 */

import * as fs from "fs/promises";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * ENOENT 여부
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
