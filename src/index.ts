// 型定義
export type { Run, Comparator, Domain } from './types.js'

// ドメイン
export { integerDomain, bigintDomain } from './domain.js'

// エラー
export { RunListError, InvalidRangeError, DomainMismatchError } from './errors.js'

// ランリスト
export { RunList } from './run-list.js'

// ラン木
export type { RunNode } from './run-tree.js'
export { RunTree, nextNode } from './run-tree.js'

// ラン配列ユーティリティ
export {
  overlaps,
  touches,
  spanRuns,
  pushRun,
  normalizeRuns,
  intersectRuns,
} from './utils/run-ops.js'
