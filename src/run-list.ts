/**
 * ランリスト
 *
 * 順序付き離散ドメインの部分集合を、互いに素で隣接しない半開区間（ラン）の
 * 最小集合として保持する。反転フラグにより、同じランで集合そのものか
 * その補集合かを表す。
 *
 * 格納ランに対する操作（挿入・削除・共通部分）は極性を知らない。
 * 反転フラグは公開APIの境界でのみ解釈し、補集合を実体化することはない。
 */

import { DomainMismatchError, InvalidRangeError } from './errors.js'
import { RunTree, nextNode } from './run-tree.js'
import type { Comparator, Domain, Run } from './types.js'
import { intersectRuns, normalizeRuns, overlaps, spanRuns, touches } from './utils/run-ops.js'

/**
 * ランを格納ランに合流させる。
 * 重なるか接しているランはすべて1つにマージする。O((k + 1) log n)。
 */
function insertRun<T>(tree: RunTree<T>, run: Run<T>, compare: Comparator<T>): void {
  // 直前のランが接していなければ、run の start 以降の最初のランから見る
  let node = tree.floor(run[0])
  if (node === null || !touches(node.run, run, compare)) {
    node = tree.ceiling(run[0])
  }

  let merged = run
  const absorbed: T[] = []
  while (node !== null && touches(node.run, merged, compare)) {
    merged = spanRuns(merged, node.run, compare)
    absorbed.push(node.run[0])
    node = nextNode(node)
  }

  for (const start of absorbed) {
    tree.remove(start)
  }
  tree.insert(merged)
}

/**
 * 格納ランから run の範囲を取り除く。
 * run を厳密に含むランは2つに分割し、部分的に重なるランは切り詰める。
 */
function removeRun<T>(tree: RunTree<T>, run: Run<T>, compare: Comparator<T>): void {
  let node = tree.floor(run[0])
  if (node === null || !overlaps(node.run, run, compare)) {
    node = tree.ceiling(run[0])
  }

  const affected: Run<T>[] = []
  while (node !== null && overlaps(node.run, run, compare)) {
    affected.push(node.run)
    node = nextNode(node)
  }

  for (const target of affected) {
    tree.remove(target[0])
    if (compare(target[0], run[0]) < 0) {
      tree.insert([target[0], run[0]])
    }
    if (compare(run[1], target[1]) < 0) {
      tree.insert([run[1], target[1]])
    }
  }
}

/** runs を格納した木から others を取り除いた新しい木 */
function differenceTree<T>(
  runs: readonly Run<T>[],
  others: readonly Run<T>[],
  compare: Comparator<T>,
): RunTree<T> {
  const tree = RunTree.fromSorted(runs, compare)
  for (const run of others) {
    removeRun(tree, run, compare)
  }
  return tree
}

export class RunList<T> {
  /** ランを置くドメイン */
  readonly domain: Domain<T>
  private _runs: RunTree<T>
  private _inverted = false

  constructor(domain: Domain<T>) {
    this.domain = domain
    this._runs = new RunTree(domain.compare)
  }

  /**
   * 任意順・重複ありのランから RunList を構築する。
   * 各ランは検証したうえで正規化し、平衡木に一括ロードする。
   */
  static from<T>(domain: Domain<T>, runs: Iterable<Run<T>>): RunList<T> {
    const list = new RunList(domain)
    const checked: Run<T>[] = []
    for (const run of runs) {
      list.assertRange(run[0], run[1])
      checked.push(run)
    }
    list._runs = RunTree.fromSorted(normalizeRuns(checked, domain.compare), domain.compare)
    return list
  }

  /** 格納ラン数 */
  get length(): number {
    return this._runs.length
  }

  /** 反転しているか */
  get isInverted(): boolean {
    return this._inverted
  }

  /** 表す集合に [start, end) を加える */
  addRun(start: T, end: T): void {
    this.assertRange(start, end)
    if (this._inverted) {
      removeRun(this._runs, [start, end], this.domain.compare)
    } else {
      insertRun(this._runs, [start, end], this.domain.compare)
    }
  }

  /** 表す集合から [start, end) を取り除く */
  subRun(start: T, end: T): void {
    this.assertRange(start, end)
    if (this._inverted) {
      insertRun(this._runs, [start, end], this.domain.compare)
    } else {
      removeRun(this._runs, [start, end], this.domain.compare)
    }
  }

  /** 1点を加える */
  addPoint(key: T): void {
    this.addRun(key, this.domain.next(key))
  }

  /** 1点を取り除く */
  subPoint(key: T): void {
    this.subRun(key, this.domain.next(key))
  }

  /** key が表す集合に含まれるか。O(log n) */
  inRun(key: T): boolean {
    const node = this._runs.floor(key)
    const inStored = node !== null && this.domain.compare(key, node.run[1]) < 0
    return inStored !== this._inverted
  }

  /** 集合を補集合に切り替える。格納ランには触れない。O(1) */
  invert(): void {
    this._inverted = !this._inverted
  }

  /**
   * other との和集合にする。other は変更しない。
   *
   * 格納ランを a（this）、b（other）とすると:
   *   通常 ∪ 通常 = a ∪ b
   *   通常 ∪ 反転 = ¬(b \ a)
   *   反転 ∪ 通常 = ¬(a \ b)
   *   反転 ∪ 反転 = ¬(a ∩ b)
   */
  add(other: RunList<T>): void {
    this.assertSameDomain(other)
    const compare = this.domain.compare
    const theirs = other.toArray()

    if (!this._inverted && !other._inverted) {
      for (const run of theirs) insertRun(this._runs, run, compare)
    } else if (!this._inverted) {
      this._runs = differenceTree(theirs, this.toArray(), compare)
      this._inverted = true
    } else if (!other._inverted) {
      for (const run of theirs) removeRun(this._runs, run, compare)
    } else {
      this._runs = RunTree.fromSorted(intersectRuns(this.toArray(), theirs, compare), compare)
    }
  }

  /**
   * other との差集合にする。other は変更しない。
   *
   *   通常 \ 通常 = a \ b
   *   通常 \ 反転 = a ∩ b
   *   反転 \ 通常 = ¬(a ∪ b)
   *   反転 \ 反転 = b \ a
   */
  sub(other: RunList<T>): void {
    this.assertSameDomain(other)
    const compare = this.domain.compare
    const theirs = other.toArray()

    if (!this._inverted && !other._inverted) {
      for (const run of theirs) removeRun(this._runs, run, compare)
    } else if (!this._inverted) {
      this._runs = RunTree.fromSorted(intersectRuns(this.toArray(), theirs, compare), compare)
    } else if (!other._inverted) {
      for (const run of theirs) insertRun(this._runs, run, compare)
    } else {
      this._runs = differenceTree(theirs, this.toArray(), compare)
      this._inverted = false
    }
  }

  /** 同じドメイン・ラン・反転フラグを持つ独立したコピー */
  clone(): RunList<T> {
    const copy = new RunList(this.domain)
    copy._runs = RunTree.fromSorted(this.toArray(), this.domain.compare)
    copy._inverted = this._inverted
    return copy
  }

  /** 空集合（非反転）に戻す */
  clear(): void {
    this._runs.clear()
    this._inverted = false
  }

  /** 格納ランを開始位置順に取得（デバッグ・テスト用）。反転フラグは反映しない */
  toArray(): Run<T>[] {
    return this._runs.toArray()
  }

  private assertRange(start: T, end: T): void {
    if (!(this.domain.compare(start, end) < 0)) {
      throw new InvalidRangeError(start, end)
    }
  }

  private assertSameDomain(other: RunList<T>): void {
    if (other.domain !== this.domain) {
      throw new DomainMismatchError()
    }
  }
}
