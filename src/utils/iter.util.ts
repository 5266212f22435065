/**
 * 惰性 Iterable 小工具。
 *
 * 全部返回“可重启”的 Iterable：每次 for..of 都从头重新计算，
 * 不会像一次性的 Iterator 那样被消费掉。
 */

export function lazy<T>(make: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: make };
}

export function filter_iter<T>(source: Iterable<T>, pred: (item: T) => boolean): Iterable<T> {
  return lazy(function* () {
    for (const item of source) if (pred(item)) yield item;
  });
}

export function drop<T>(count: number, source: Iterable<T>): Iterable<T> {
  return lazy(function* () {
    let skipped = 0;
    for (const item of source) {
      if (skipped < count) {
        skipped += 1;
        continue;
      }
      yield item;
    }
  });
}

export function take_while<T>(source: Iterable<T>, pred: (item: T) => boolean): Iterable<T> {
  return lazy(function* () {
    for (const item of source) {
      if (!pred(item)) return;
      yield item;
    }
  });
}

/** 按相邻两两分组；末尾落单的元素丢弃 */
export function pairs<T>(source: Iterable<T>): Iterable<[T, T]> {
  return lazy(function* () {
    let pending: { item: T } | null = null;
    for (const item of source) {
      if (pending) {
        yield [pending.item, item];
        pending = null;
      } else {
        pending = { item };
      }
    }
  });
}

export function first<T>(source: Iterable<T>): T | null {
  for (const item of source) return item;
  return null;
}

export function nth<T>(source: Iterable<T>, index: number): T | null {
  return first(drop(index, source));
}

export function count<T>(source: Iterable<T>): number {
  const it = source[Symbol.iterator]();
  let n = 0;
  while (!it.next().done) n += 1;
  return n;
}
