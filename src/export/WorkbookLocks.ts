/**
 * 출력 파일 경로별 Mutex 레지스트리
 *
 * 같은 워크북을 여는 모든 생산자(한 실행의 여러 Job, 같은 프로세스의 여러 실행)가
 * 동일한 Mutex를 공유하도록 절대 경로로 키를 잡음
 */

import * as path from "path";
import { Mutex } from "async-mutex";

const locks = new Map<string, Mutex>();

export function getWorkbookLock(outputPath: string): Mutex {
  const key = path.resolve(outputPath);
  let lock = locks.get(key);
  if (!lock) {
    lock = new Mutex();
    locks.set(key, lock);
  }
  return lock;
}
