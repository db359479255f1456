export type Limiter = {
  run: <R>(task: () => Promise<R>) => Promise<R>;
  readonly active: number;
  readonly pending: number;
};

/** 按需提交任务的固定并发池（缩略图下载与 feed 刷新共用这一实现）。 */
export function createLimiter(concurrency: number): Limiter {
  const max = Math.max(1, Math.floor(concurrency || 1));
  const queue: Array<() => void> = [];
  let active = 0;

  const next = () => {
    if (active >= max) return;
    const start = queue.shift();
    if (!start) return;
    active += 1;
    start();
  };

  const run = <R>(task: () => Promise<R>): Promise<R> =>
    new Promise<R>((resolve, reject) => {
      queue.push(() => {
        void task()
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });

  return {
    run,
    get active() {
      return active;
    },
    get pending() {
      return queue.length;
    }
  };
}

/** 一次性提交整批任务；结果按输入下标排列，与完成先后无关。 */
export async function mapWithConcurrency<T, R>(params: {
  items: readonly T[];
  concurrency: number;
  fn: (item: T, index: number) => Promise<R>;
}): Promise<R[]> {
  const { items, fn } = params;
  if (items.length === 0) return [];
  const limiter = createLimiter(Math.min(params.concurrency, items.length));
  return await Promise.all(items.map(async (item, i) => await limiter.run(async () => await fn(item, i))));
}
