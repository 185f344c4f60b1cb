/**
 * Keyed Lock
 * 以鍵值區分的互斥鎖：同一個鍵同時只有一個工作在執行，不同鍵互不阻塞
 *
 * 排隊中的呼叫可由自己的 signal 取消；取消的呼叫不會取得鎖，
 * 後面排隊的呼叫仍會等到前一個持有者結束。
 */

import { untilAborted } from './abortable.js';

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * 取得 key 的鎖後執行 fn，fn 結束（成功或失敗）後釋放
   * 等待期間 signal 中斷時拋出 CancelledError，fn 不會執行
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.tails.set(key, tail);

    try {
      await untilAborted(previous, signal);
    } catch (error) {
      // 放棄排隊：tail 仍等前一個持有者結束才釋放
      release();
      void tail.then(() => this.forget(key, tail));
      throw error;
    }

    try {
      return await fn();
    } finally {
      release();
      this.forget(key, tail);
    }
  }

  private forget(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }

  /**
   * key 是否有工作正在執行或等待
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
