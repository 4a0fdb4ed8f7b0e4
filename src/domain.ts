import type { Domain } from './types.js'

/**
 * 数値ドメイン（ブロック番号・インデックスなど）
 *
 * 整数である必要はなく、任意の数値を受け付ける。next は 1 進めるだけなので
 * addPoint(0.5) は [0.5, 1.5) になる。±Infinity も端点に使える。
 * NaN との比較は 0 になり、RunList 側で無効な範囲として弾かれる。
 */
export const integerDomain: Domain<number> = {
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  next: (value) => value + 1,
}

/** bigint ドメイン（2^53 を超えるアドレス空間用） */
export const bigintDomain: Domain<bigint> = {
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  next: (value) => value + 1n,
}
