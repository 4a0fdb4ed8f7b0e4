import type { Comparator, Run } from '../types.js'

/** 大きい方 */
function maxOf<T>(a: T, b: T, compare: Comparator<T>): T {
  return compare(a, b) >= 0 ? a : b
}

/** 小さい方 */
function minOf<T>(a: T, b: T, compare: Comparator<T>): T {
  return compare(a, b) <= 0 ? a : b
}

/**
 * 2つのランが重なるか（半開区間）。
 * 一方の start が他方の end より厳密に前にあるときだけ重なる。
 */
export function overlaps<T>(a: Run<T>, b: Run<T>, compare: Comparator<T>): boolean {
  return compare(a[0], b[1]) < 0 && compare(b[0], a[1]) < 0
}

/**
 * 2つのランが重なるか接しているか。
 * true なら和集合が1つのランになる。
 */
export function touches<T>(a: Run<T>, b: Run<T>, compare: Comparator<T>): boolean {
  return compare(a[0], b[1]) <= 0 && compare(b[0], a[1]) <= 0
}

/** 2つのランを覆う最小のラン [min(start), max(end)) */
export function spanRuns<T>(a: Run<T>, b: Run<T>, compare: Comparator<T>): Run<T> {
  return [minOf(a[0], b[0], compare), maxOf(a[1], b[1], compare)]
}

/**
 * ソート済みラン配列の末尾にランを追加する。
 * 末尾のエントリと重なるか接している場合はマージする。
 * run の start は末尾エントリの start 以上であること。
 */
export function pushRun<T>(runs: Run<T>[], run: Run<T>, compare: Comparator<T>): void {
  if (runs.length > 0) {
    const last = runs[runs.length - 1]!
    if (touches(last, run, compare)) {
      runs[runs.length - 1] = spanRuns(last, run, compare)
      return
    }
  }
  runs.push(run)
}

/** 任意順・重複ありのランを、ソート済み・互いに素・非隣接の配列にする */
export function normalizeRuns<T>(runs: Iterable<Run<T>>, compare: Comparator<T>): Run<T>[] {
  const sorted = [...runs].sort((a, b) => compare(a[0], b[0]))
  const result: Run<T>[] = []
  for (const run of sorted) {
    pushRun(result, run, compare)
  }
  return result
}

/** 正規化済みラン配列2つの共通部分。O(n + m) */
export function intersectRuns<T>(
  a: readonly Run<T>[],
  b: readonly Run<T>[],
  compare: Comparator<T>,
): Run<T>[] {
  const result: Run<T>[] = []
  let i = 0
  let j = 0

  while (i < a.length && j < b.length) {
    const x = a[i]!
    const y = b[j]!
    if (overlaps(x, y, compare)) {
      pushRun(result, [maxOf(x[0], y[0], compare), minOf(x[1], y[1], compare)], compare)
    }
    // 先に終わる方を進める
    if (compare(x[1], y[1]) < 0) {
      i++
    } else {
      j++
    }
  }

  return result
}
